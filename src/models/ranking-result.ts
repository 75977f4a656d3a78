/**
 * Outputs of the ranking engine
 *
 * @module ranking-result
 */

import type { MovieId } from './movie.js';

/**
 * Ranking strategy
 */
export type RankingMode = 'classical' | 'quantum';

export const RANKING_MODES: readonly RankingMode[] = ['classical', 'quantum'];

export function isRankingMode(value: string): value is RankingMode {
  return RANKING_MODES.some(mode => mode === value);
}

/**
 * Per-call diagnostics
 */
export interface RankingDiagnostics {
  /**
   * Classical: candidates evaluated (N)
   * Quantum: oracle/diffusion rounds (R)
   */
  iterations: number;

  /**
   * Raw relevance score of the selected candidate
   */
  topScore: number;

  /**
   * Squared amplitude of the selected candidate (quantum only)
   */
  probability?: number;

  /**
   * Number of candidates flipped by the oracle (quantum only)
   */
  markedCount?: number;

  /**
   * True when the runner-up replaced the amplitude winner (quantum only)
   */
  tunneled?: boolean;
}

export interface RankingResult {
  /**
   * 0-based position in the input candidate sequence
   */
  index: number;
  movieId: MovieId;
  mode: RankingMode;
  diagnostics: RankingDiagnostics;
}

/**
 * Side-by-side outcome of both rankers over the same candidate set
 *
 * Disagreement is surfaced as-is; nothing is resolved.
 */
export interface ComparisonResult {
  classical: RankingResult;
  quantum: RankingResult;
  classicalIndex: number;
  quantumIndex: number;
  quantumIterations: number;
  agree: boolean;

  /**
   * 1 - Jaccard similarity of the two selections' genre/cast tags [0, 1]
   */
  diversity: number;
}

/**
 * How the search service arrived at its selection
 */
export type SearchOutcome =
  | {
      matchedBy: 'title-year';
      index: number;
      movieId: MovieId;
    }
  | {
      matchedBy: RankingMode;
      index: number;
      movieId: MovieId;
      ranking: RankingResult;
    };
