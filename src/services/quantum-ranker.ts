/**
 * Simulated amplitude amplification ranking
 *
 * @module quantum-ranker
 */

import type { Movie } from '../models/movie.js';
import type { AmplificationConfig, RankingConfig } from '../models/ranking-config.js';
import type { RankingResult } from '../models/ranking-result.js';
import type { RankingError } from '../lib/errors/RankingErrors.js';
import { EmptyCandidateSetError } from '../lib/errors/RankingErrors.js';
import { prepareRankingInput } from '../lib/ranking-utils.js';
import { err, ok, type Result } from '../lib/result-types.js';
import { PROBABILITY_EPSILON, SCORE_EPSILON } from '../constants/ranking-constants.js';
import { RelevanceScorer } from './relevance-scorer.js';
import { TieBreaker } from './tie-breaker.js';

/**
 * Oracle step: flip the sign of every marked amplitude (in place)
 */
export function applyOracle(amplitudes: number[], marked: readonly boolean[]): void {
  for (let i = 0; i < amplitudes.length; i++) {
    if (marked[i]) {
      amplitudes[i] = -amplitudes[i];
    }
  }
}

/**
 * Diffusion step: reflect every amplitude about the mean (in place)
 */
export function applyDiffusion(amplitudes: number[]): void {
  const mean = amplitudes.reduce((sum, a) => sum + a, 0) / amplitudes.length;

  for (let i = 0; i < amplitudes.length; i++) {
    amplitudes[i] = 2 * mean - amplitudes[i];
  }
}

/**
 * Grover iteration count floor(pi/4 * sqrt(N/M)), clamped to [1, N]
 *
 * @param candidateCount - N
 * @param markedCount - M
 */
export function calculateIterations(candidateCount: number, markedCount: number): number {
  const optimal = Math.floor((Math.PI / 4) * Math.sqrt(candidateCount / Math.max(markedCount, 1)));
  return Math.min(candidateCount, Math.max(1, optimal));
}

/**
 * Uniform superposition over N candidates
 */
export function uniformAmplitudes(candidateCount: number): number[] {
  return new Array<number>(candidateCount).fill(1 / Math.sqrt(candidateCount));
}

/**
 * QuantumRanker selects a candidate by simulating amplitude amplification
 *
 * 1. Mark candidates scoring above mean * relevanceThresholdMultiplier
 *    (the single best candidate when none qualifies)
 * 2. Start from a uniform amplitude vector
 * 3. Run R oracle + diffusion rounds
 * 4. Select the highest-probability candidate
 * 5. Tunneling: swap in the runner-up when its raw score beats the
 *    selection's by more than tunnelingMargin
 *
 * Fully deterministic; amplitudes are plain numbers.
 */
export class QuantumRanker {
  private scorer: RelevanceScorer;
  private amplification: AmplificationConfig;
  private scoreTieBreaker: TieBreaker;
  private probabilityTieBreaker: TieBreaker;

  constructor(config: RankingConfig) {
    this.scorer = new RelevanceScorer(config.scoring);
    this.amplification = config.amplification;
    this.scoreTieBreaker = new TieBreaker(SCORE_EPSILON);
    this.probabilityTieBreaker = new TieBreaker(PROBABILITY_EPSILON);
  }

  rank(candidates: readonly Movie[], query: string): Result<RankingResult, RankingError> {
    const input = prepareRankingInput(candidates, query);
    if (input.isErr()) {
      return err(input.error);
    }

    const scores = this.scorer.scoreAll(candidates, input.value);
    const marked = this.markRelevant(scores, candidates);
    const markedCount = marked.filter(Boolean).length;

    const amplitudes = uniformAmplitudes(candidates.length);
    const iterations = calculateIterations(candidates.length, markedCount);

    for (let round = 0; round < iterations; round++) {
      applyOracle(amplitudes, marked);
      applyDiffusion(amplitudes);
    }

    const probabilities = amplitudes.map(a => a * a);
    const selected = this.probabilityTieBreaker.selectBest(probabilities, candidates);
    if (selected === null) {
      return err(new EmptyCandidateSetError());
    }

    const index = this.tunnel(selected, probabilities, scores, candidates);

    return ok({
      index,
      movieId: candidates[index].id,
      mode: 'quantum',
      diagnostics: {
        iterations,
        topScore: scores[index],
        probability: probabilities[index],
        markedCount,
        tunneled: index !== selected,
      },
    });
  }

  /**
   * Mark candidates above the relative relevance bar by more than SCORE_EPSILON
   */
  private markRelevant(scores: readonly number[], candidates: readonly Movie[]): boolean[] {
    const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
    const threshold = mean * this.amplification.relevanceThresholdMultiplier;
    const marked = scores.map(score => score - threshold > SCORE_EPSILON);

    if (!marked.includes(true)) {
      // Amplification needs a target
      const best = this.scoreTieBreaker.selectBest(scores, candidates);
      if (best !== null) {
        marked[best] = true;
      }
    }

    return marked;
  }

  /**
   * Replace the amplitude winner with the runner-up when the runner-up's raw
   * relevance exceeds the winner's by more than the tunneling margin
   */
  private tunnel(
    selected: number,
    probabilities: readonly number[],
    scores: readonly number[],
    candidates: readonly Movie[]
  ): number {
    const runnerUp = this.probabilityTieBreaker.selectBest(probabilities, candidates, selected);
    if (runnerUp === null) {
      return selected;
    }

    const bar = scores[selected] * (1 + this.amplification.tunnelingMargin);
    return scores[runnerUp] > bar ? runnerUp : selected;
  }
}
