/**
 * Classical ranking by direct score maximization
 *
 * @module classical-ranker
 */

import type { Movie } from '../models/movie.js';
import type { RankingConfig } from '../models/ranking-config.js';
import type { RankingResult } from '../models/ranking-result.js';
import type { RankingError } from '../lib/errors/RankingErrors.js';
import { EmptyCandidateSetError } from '../lib/errors/RankingErrors.js';
import { prepareRankingInput } from '../lib/ranking-utils.js';
import { err, ok, type Result } from '../lib/result-types.js';
import { SCORE_EPSILON } from '../constants/ranking-constants.js';
import { RelevanceScorer } from './relevance-scorer.js';
import { TieBreaker } from './tie-breaker.js';

/**
 * ClassicalRanker selects the candidate with the highest relevance score
 *
 * Linear scan over the score vector; ties go to higher popularity, then to
 * the earliest candidate.
 */
export class ClassicalRanker {
  private scorer: RelevanceScorer;
  private tieBreaker: TieBreaker;

  constructor(config: RankingConfig) {
    this.scorer = new RelevanceScorer(config.scoring);
    this.tieBreaker = new TieBreaker(SCORE_EPSILON);
  }

  rank(candidates: readonly Movie[], query: string): Result<RankingResult, RankingError> {
    const input = prepareRankingInput(candidates, query);
    if (input.isErr()) {
      return err(input.error);
    }

    const scores = this.scorer.scoreAll(candidates, input.value);
    const index = this.tieBreaker.selectBest(scores, candidates);
    if (index === null) {
      return err(new EmptyCandidateSetError());
    }

    return ok({
      index,
      movieId: candidates[index].id,
      mode: 'classical',
      diagnostics: {
        iterations: candidates.length,
        topScore: scores[index],
      },
    });
  }
}
