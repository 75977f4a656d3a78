/**
 * Unit tests for MovieSearchService
 */

import { describe, it, expect, vi } from 'vitest';
import { MovieSearchService } from '../../src/services/movie-search.js';
import { Logger } from '../../src/lib/logger.js';
import { CandidateLimitError, InvalidQueryError } from '../../src/lib/errors/RankingErrors.js';
import { DEFAULT_RANKING_CONFIG } from '../../src/constants/ranking-constants.js';
import {
  amplificationArtifactCandidates,
  createConfig,
  createMovie,
  dreamCandidates,
} from '../helpers/movie-test-helper.js';

function quietLogger(): Logger {
  return new Logger({ console: false });
}

describe('MovieSearchService', () => {
  describe('Mode dispatch', () => {
    it('should rank classically by default', () => {
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, quietLogger());

      const outcome = service.search(dreamCandidates(), 'dream inside dreams')._unsafeUnwrap();

      expect(outcome.matchedBy).toBe('classical');
      expect(outcome.index).toBe(0);
      expect(outcome.movieId).toBe(27205);
    });

    it('should rank with the quantum ranker on request', () => {
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, quietLogger());

      const outcome = service.search(amplificationArtifactCandidates(), 'space', { mode: 'quantum' })._unsafeUnwrap();

      expect(outcome.matchedBy).toBe('quantum');
      expect(outcome.index).toBe(2);
      if (outcome.matchedBy === 'quantum') {
        expect(outcome.ranking.diagnostics.iterations).toBe(1);
      }
    });
  });

  describe('Title and year matching', () => {
    const candidates = [
      createMovie(841, 'Dune', 'a desert planet epic', 30, { releaseDate: '1984-12-14' }),
      createMovie(438631, 'Dune', 'a desert planet epic', 90, { releaseDate: '2021-09-15' }),
    ];

    it('should skip ranking on an exact title/year match', () => {
      const logger = quietLogger();
      const logDecision = vi.spyOn(logger, 'logRankingDecision');
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, logger);

      const outcome = service.search(candidates, 'Dune', { mode: 'quantum', year: '1984' })._unsafeUnwrap();

      expect(outcome).toEqual({ matchedBy: 'title-year', index: 0, movieId: 841 });
      expect(logDecision).toHaveBeenCalledWith({
        matched_by: 'title-year',
        query: 'Dune',
        candidate_count: 2,
        selected_index: 0,
        movie_id: 841,
      });
    });

    it('should rank when the year does not match', () => {
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, quietLogger());

      const outcome = service.search(candidates, 'Dune', { year: '1999' })._unsafeUnwrap();

      // Equal matches; popularity 90 wins
      expect(outcome.matchedBy).toBe('classical');
      expect(outcome.index).toBe(1);
    });
  });

  describe('Logging', () => {
    it('should log each ranking decision', () => {
      const logger = quietLogger();
      const logDecision = vi.spyOn(logger, 'logRankingDecision');
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, logger);

      service.search(dreamCandidates(), 'dream inside dreams', { mode: 'quantum' });

      expect(logDecision).toHaveBeenCalledWith({
        matched_by: 'quantum',
        query: 'dream inside dreams',
        candidate_count: 2,
        selected_index: 0,
        movie_id: 27205,
        iterations: 1,
        tunneled: false,
      });
    });

    it('should log tunneling corrections', () => {
      const logger = quietLogger();
      const info = vi.spyOn(logger, 'info');
      const config = createConfig({ amplification: { tunnelingMargin: 0.01 } });
      const service = new MovieSearchService(config, logger);

      service.search(amplificationArtifactCandidates(), 'space', { mode: 'quantum' });

      expect(info).toHaveBeenCalledWith('Tunneling correction replaced the amplitude winner', {
        query: 'space',
        selectedIndex: 0,
      });
    });
  });

  describe('Errors', () => {
    it('should reject candidate sets above the configured limit', () => {
      const config = createConfig({ limits: { maxCandidates: 2 } });
      const service = new MovieSearchService(config, quietLogger());

      const error = service.search(amplificationArtifactCandidates(), 'space')._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(CandidateLimitError);
      expect(error.code).toBe('CANDIDATE_LIMIT_EXCEEDED');
      expect(service.compare(amplificationArtifactCandidates(), 'space').isErr()).toBe(true);
    });

    it('should pass ranking errors through', () => {
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, quietLogger());

      expect(service.search(dreamCandidates(), '  ')._unsafeUnwrapErr()).toBeInstanceOf(InvalidQueryError);
    });
  });

  describe('compare', () => {
    it('should delegate to the mode comparator', () => {
      const service = new MovieSearchService(DEFAULT_RANKING_CONFIG, quietLogger());

      const comparison = service.compare(amplificationArtifactCandidates(), 'space')._unsafeUnwrap();

      expect(comparison.agree).toBe(false);
      expect(comparison.classicalIndex).toBe(0);
      expect(comparison.quantumIndex).toBe(2);
    });
  });
});
