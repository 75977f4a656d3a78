/**
 * Library entry points
 *
 * @module quantum-movie-ranker
 */

import type { Movie } from './models/movie.js';
import type { RankingConfig } from './models/ranking-config.js';
import type { ComparisonResult, RankingResult } from './models/ranking-result.js';
import type { RankingError } from './lib/errors/RankingErrors.js';
import type { Result } from './lib/result-types.js';
import { DEFAULT_RANKING_CONFIG } from './constants/ranking-constants.js';
import { ClassicalRanker } from './services/classical-ranker.js';
import { QuantumRanker } from './services/quantum-ranker.js';
import { ModeComparator } from './services/mode-comparator.js';

/**
 * Select the candidate with the highest relevance score
 */
export function rankClassical(
  candidates: readonly Movie[],
  query: string,
  config: RankingConfig = DEFAULT_RANKING_CONFIG
): Result<RankingResult, RankingError> {
  return new ClassicalRanker(config).rank(candidates, query);
}

/**
 * Select a candidate by simulated amplitude amplification
 */
export function rankQuantum(
  candidates: readonly Movie[],
  query: string,
  config: RankingConfig = DEFAULT_RANKING_CONFIG
): Result<RankingResult, RankingError> {
  return new QuantumRanker(config).rank(candidates, query);
}

/**
 * Run both rankers and report how their selections differ
 */
export function compareModes(
  candidates: readonly Movie[],
  query: string,
  config: RankingConfig = DEFAULT_RANKING_CONFIG
): Result<ComparisonResult, RankingError> {
  return new ModeComparator(config).compare(candidates, query);
}

export type { Movie, MovieId } from './models/movie.js';
export { MovieSchema, CandidateFileSchema } from './models/movie.js';
export type {
  RankingConfig,
  ScoringConfig,
  AmplificationConfig,
  LimitsConfig,
} from './models/ranking-config.js';
export type {
  RankingMode,
  RankingDiagnostics,
  RankingResult,
  ComparisonResult,
  SearchOutcome,
} from './models/ranking-result.js';
export { DEFAULT_RANKING_CONFIG } from './constants/ranking-constants.js';
export {
  RankingError,
  ErrorCategory,
  EmptyCandidateSetError,
  InvalidQueryError,
  CandidateLimitError,
  CandidateFileError,
  ConfigurationError,
  isRankingError,
} from './lib/errors/RankingErrors.js';
export { tokenize, parseQuery } from './lib/tokenizer.js';
export { validateRankingConfig, calculateTagDiversity } from './lib/ranking-utils.js';
export { Logger, type LoggerConfig, type LogLevel } from './lib/logger.js';
export { loadEnvironment, ConfigurationManager, type EnvironmentSettings } from './lib/env-config.js';
export { RelevanceScorer, type RelevanceBreakdown } from './services/relevance-scorer.js';
export { TieBreaker } from './services/tie-breaker.js';
export { ClassicalRanker } from './services/classical-ranker.js';
export {
  QuantumRanker,
  applyOracle,
  applyDiffusion,
  calculateIterations,
  uniformAmplitudes,
} from './services/quantum-ranker.js';
export { ModeComparator } from './services/mode-comparator.js';
export { findTitleYearMatch } from './services/title-matcher.js';
export { MovieSearchService, type SearchOptions } from './services/movie-search.js';
export { ConfigurationService } from './services/configuration-service.js';
export { loadCandidates, parseCandidates } from './services/candidate-loader.js';
