/**
 * Deterministic argmax with tie-breaking
 *
 * @module tie-breaker
 */

import type { Movie } from '../models/movie.js';

/**
 * TieBreaker picks the best entry of a value vector aligned with a candidate set
 *
 * Factors (in priority order):
 * 1. Higher value (values within epsilon are tied)
 * 2. Higher popularity
 * 3. Lower original index (first seen wins)
 */
export class TieBreaker {
  private epsilon: number;

  /**
   * Create a new TieBreaker
   *
   * @param epsilon - Maximum difference at which two values count as tied
   */
  constructor(epsilon: number) {
    this.epsilon = epsilon;
  }

  /**
   * Select the index of the best value
   *
   * @param values - One value per candidate
   * @param candidates - Candidates aligned with values
   * @param excluded - Index to skip (used to find a runner-up)
   * @returns Winning index, or null when no index is eligible
   */
  selectBest(
    values: readonly number[],
    candidates: readonly Movie[],
    excluded?: number
  ): number | null {
    let best: number | null = null;

    for (let i = 0; i < values.length; i++) {
      if (i === excluded) {
        continue;
      }

      if (best === null || this.compare(i, best, values, candidates) > 0) {
        best = i;
      }
    }

    return best;
  }

  /**
   * Compare two indices
   *
   * @returns Positive if a ranks above b, negative if below, 0 if fully tied
   */
  compare(a: number, b: number, values: readonly number[], candidates: readonly Movie[]): number {
    const diff = values[a] - values[b];
    if (Math.abs(diff) > this.epsilon) {
      return diff;
    }

    const popularityDiff = candidates[a].popularity - candidates[b].popularity;
    if (popularityDiff !== 0) {
      return popularityDiff;
    }

    return b - a;
  }
}
