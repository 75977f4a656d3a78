/**
 * Side-by-side comparison of the classical and quantum rankers
 *
 * @module mode-comparator
 */

import type { Movie } from '../models/movie.js';
import type { RankingConfig } from '../models/ranking-config.js';
import type { ComparisonResult } from '../models/ranking-result.js';
import type { RankingError } from '../lib/errors/RankingErrors.js';
import { calculateTagDiversity } from '../lib/ranking-utils.js';
import { err, ok, type Result } from '../lib/result-types.js';
import { ClassicalRanker } from './classical-ranker.js';
import { QuantumRanker } from './quantum-ranker.js';

/**
 * ModeComparator runs both rankers over the same candidates
 *
 * Purely observational: when the rankers disagree both selections are
 * returned untouched.
 */
export class ModeComparator {
  private classical: ClassicalRanker;
  private quantum: QuantumRanker;

  constructor(config: RankingConfig) {
    this.classical = new ClassicalRanker(config);
    this.quantum = new QuantumRanker(config);
  }

  compare(candidates: readonly Movie[], query: string): Result<ComparisonResult, RankingError> {
    const classical = this.classical.rank(candidates, query);
    if (classical.isErr()) {
      return err(classical.error);
    }

    const quantum = this.quantum.rank(candidates, query);
    if (quantum.isErr()) {
      return err(quantum.error);
    }

    const classicalIndex = classical.value.index;
    const quantumIndex = quantum.value.index;

    return ok({
      classical: classical.value,
      quantum: quantum.value,
      classicalIndex,
      quantumIndex,
      quantumIterations: quantum.value.diagnostics.iterations,
      agree: classicalIndex === quantumIndex,
      diversity: calculateTagDiversity(candidates[classicalIndex], candidates[quantumIndex]),
    });
  }
}
