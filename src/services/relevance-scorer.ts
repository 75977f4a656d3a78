/**
 * Lexical + popularity relevance scoring
 *
 * @module relevance-scorer
 */

import type { Movie } from '../models/movie.js';
import type { ScoringConfig } from '../models/ranking-config.js';
import { tokenSet } from '../lib/tokenizer.js';

/**
 * Score contributions for one movie
 */
export interface RelevanceBreakdown {
  matchCount: number;
  matchContribution: number;
  popularityContribution: number;
  score: number;
}

/**
 * RelevanceScorer computes a non-negative score for one movie against a query
 *
 * score = matchCount * matchWeight + popularity * popularityWeight
 *
 * matchCount counts query tokens present in the movie's combined
 * title + overview token set. Movies with no matches still receive their
 * popularity boost, so every candidate set has a total order.
 */
export class RelevanceScorer {
  private config: ScoringConfig;

  constructor(config: ScoringConfig) {
    this.config = config;
  }

  /**
   * Score a movie with a per-term breakdown
   *
   * @param movie - Candidate movie
   * @param queryTokens - Normalized query tokens
   */
  explain(movie: Movie, queryTokens: ReadonlySet<string>): RelevanceBreakdown {
    const movieTokens = tokenSet(`${movie.title} ${movie.overview}`);

    let matchCount = 0;
    for (const token of queryTokens) {
      if (movieTokens.has(token)) {
        matchCount++;
      }
    }

    const matchContribution = matchCount * this.config.matchWeight;
    const popularityContribution = movie.popularity * this.config.popularityWeight;

    return {
      matchCount,
      matchContribution,
      popularityContribution,
      score: matchContribution + popularityContribution,
    };
  }

  score(movie: Movie, queryTokens: ReadonlySet<string>): number {
    return this.explain(movie, queryTokens).score;
  }

  /**
   * Build the score vector, same length and order as the candidates
   */
  scoreAll(candidates: readonly Movie[], queryTokens: ReadonlySet<string>): number[] {
    return candidates.map(movie => this.score(movie, queryTokens));
  }
}
