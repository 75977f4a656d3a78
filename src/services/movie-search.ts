/**
 * Movie search over an already-fetched candidate set
 *
 * @module movie-search
 */

import type { Movie } from '../models/movie.js';
import type { RankingConfig } from '../models/ranking-config.js';
import type { ComparisonResult, RankingMode, RankingResult, SearchOutcome } from '../models/ranking-result.js';
import { CandidateLimitError, type RankingError } from '../lib/errors/RankingErrors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { err, ok, type Result } from '../lib/result-types.js';
import { ClassicalRanker } from './classical-ranker.js';
import { QuantumRanker } from './quantum-ranker.js';
import { ModeComparator } from './mode-comparator.js';
import { findTitleYearMatch } from './title-matcher.js';

export interface SearchOptions {
  /**
   * Ranking strategy (default: classical)
   */
  mode?: RankingMode;

  /**
   * Likely release year; when set, an exact title/year hit skips ranking
   */
  year?: string;
}

/**
 * MovieSearchService picks one movie from a candidate set
 *
 * Flow:
 * 1. Reject candidate sets above limits.maxCandidates
 * 2. Exact title + year match, when a year is known
 * 3. Otherwise rank with the requested mode
 */
export class MovieSearchService {
  private maxCandidates: number;
  private rankers: Record<RankingMode, ClassicalRanker | QuantumRanker>;
  private comparator: ModeComparator;
  private logger: Logger;

  constructor(config: RankingConfig, logger: Logger = defaultLogger) {
    this.maxCandidates = config.limits.maxCandidates;
    this.rankers = {
      classical: new ClassicalRanker(config),
      quantum: new QuantumRanker(config),
    };
    this.comparator = new ModeComparator(config);
    this.logger = logger;
  }

  search(
    candidates: readonly Movie[],
    query: string,
    options: SearchOptions = {}
  ): Result<SearchOutcome, RankingError> {
    const limit = this.checkLimit(candidates);
    if (limit.isErr()) {
      return err(limit.error);
    }

    const mode = options.mode ?? 'classical';
    this.logger.debug('Searching candidates', { query, mode, year: options.year, candidates: candidates.length });

    if (options.year) {
      const index = findTitleYearMatch(candidates, query, options.year);
      if (index !== null) {
        const movieId = candidates[index].id;
        this.logger.logRankingDecision({
          matched_by: 'title-year',
          query,
          candidate_count: candidates.length,
          selected_index: index,
          movie_id: movieId,
        });
        return ok({ matchedBy: 'title-year', index, movieId });
      }
    }

    const ranked = this.rankers[mode].rank(candidates, query);
    if (ranked.isErr()) {
      this.logger.debug('Ranking failed', { query, mode, code: ranked.error.code });
      return err(ranked.error);
    }

    this.logDecision(query, candidates.length, ranked.value);

    return ok({
      matchedBy: mode,
      index: ranked.value.index,
      movieId: ranked.value.movieId,
      ranking: ranked.value,
    });
  }

  compare(candidates: readonly Movie[], query: string): Result<ComparisonResult, RankingError> {
    const limit = this.checkLimit(candidates);
    if (limit.isErr()) {
      return err(limit.error);
    }

    const comparison = this.comparator.compare(candidates, query);
    if (comparison.isOk()) {
      const { agree, classicalIndex, quantumIndex, diversity } = comparison.value;
      this.logger.info('Compared ranking modes', { query, agree, classicalIndex, quantumIndex, diversity });
    }

    return comparison;
  }

  private checkLimit(candidates: readonly Movie[]): Result<void, CandidateLimitError> {
    if (candidates.length > this.maxCandidates) {
      return err(new CandidateLimitError(candidates.length, this.maxCandidates));
    }
    return ok(undefined);
  }

  private logDecision(query: string, candidateCount: number, result: RankingResult): void {
    if (result.diagnostics.tunneled) {
      this.logger.info('Tunneling correction replaced the amplitude winner', {
        query,
        selectedIndex: result.index,
      });
    }

    this.logger.logRankingDecision({
      matched_by: result.mode,
      query,
      candidate_count: candidateCount,
      selected_index: result.index,
      movie_id: result.movieId,
      iterations: result.diagnostics.iterations,
      tunneled: result.diagnostics.tunneled,
    });
  }
}
