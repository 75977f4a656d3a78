/**
 * Utility functions for movie ranking
 *
 * @module ranking-utils
 */

import { Result, ok, err } from 'neverthrow';
import type { RankingConfig } from '../models/ranking-config.js';
import type { Movie } from '../models/movie.js';
import {
  ConfigurationError,
  EmptyCandidateSetError,
  InvalidQueryError,
} from './errors/RankingErrors.js';
import { parseQuery } from './tokenizer.js';
import {
  MIN_MAX_CANDIDATES,
  MAX_MAX_CANDIDATES,
  SCORE_DISPLAY_DECIMALS,
} from '../constants/ranking-constants.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validate ranking configuration
 *
 * @param config - Configuration to validate (typically parsed JSON)
 * @returns Result with validated config or error
 */
export function validateRankingConfig(config: unknown): Result<RankingConfig, ConfigurationError> {
  if (!isRecord(config)) {
    return err(new ConfigurationError('config', config, 'must be an object'));
  }

  const { version, scoring, amplification, limits } = config;

  // Check required sections
  if (typeof version !== 'string' || version.length === 0) {
    return err(new ConfigurationError('version', version, 'must be a non-empty string'));
  }

  if (!isRecord(scoring)) {
    return err(new ConfigurationError('scoring', scoring, 'must be an object'));
  }

  if (!isRecord(amplification)) {
    return err(new ConfigurationError('amplification', amplification, 'must be an object'));
  }

  if (!isRecord(limits)) {
    return err(new ConfigurationError('limits', limits, 'must be an object'));
  }

  // Validate scoring weights
  const { matchWeight, popularityWeight } = scoring;

  if (!isFiniteNumber(matchWeight) || matchWeight < 0) {
    return err(new ConfigurationError('scoring.matchWeight', matchWeight, 'must be a number >= 0'));
  }

  if (!isFiniteNumber(popularityWeight) || popularityWeight < 0) {
    return err(new ConfigurationError('scoring.popularityWeight', popularityWeight, 'must be a number >= 0'));
  }

  // Validate amplification
  const { relevanceThresholdMultiplier, tunnelingMargin } = amplification;

  if (!isFiniteNumber(relevanceThresholdMultiplier) || relevanceThresholdMultiplier <= 0) {
    return err(new ConfigurationError(
      'amplification.relevanceThresholdMultiplier',
      relevanceThresholdMultiplier,
      'must be a number > 0'
    ));
  }

  if (!isFiniteNumber(tunnelingMargin) || tunnelingMargin < 0) {
    return err(new ConfigurationError('amplification.tunnelingMargin', tunnelingMargin, 'must be a number >= 0'));
  }

  // Validate limits
  const { maxCandidates } = limits;

  if (
    !isFiniteNumber(maxCandidates) ||
    !Number.isInteger(maxCandidates) ||
    maxCandidates < MIN_MAX_CANDIDATES ||
    maxCandidates > MAX_MAX_CANDIDATES
  ) {
    return err(new ConfigurationError(
      'limits.maxCandidates',
      maxCandidates,
      `must be an integer between ${MIN_MAX_CANDIDATES} and ${MAX_MAX_CANDIDATES}`
    ));
  }

  // All validations passed
  return ok({
    version,
    scoring: { matchWeight, popularityWeight },
    amplification: { relevanceThresholdMultiplier, tunnelingMargin },
    limits: { maxCandidates },
  });
}

/**
 * Check if configuration has extreme weights
 *
 * Extreme weights occur when:
 * - matchWeight = 0 (ranking reduces to popularity)
 * - popularityWeight = 0 (no ordering among equally-matching movies)
 * - tunnelingMargin = 0 (any better-scoring runner-up overrides amplification)
 *
 * @param config - Ranking configuration
 * @returns True if extreme weights detected
 */
export function hasExtremeWeights(config: RankingConfig): boolean {
  const { matchWeight, popularityWeight } = config.scoring;
  return matchWeight === 0 || popularityWeight === 0 || config.amplification.tunnelingMargin === 0;
}

/**
 * Format score for display
 *
 * @param score - Score value to format
 * @param decimals - Number of decimal places (default: SCORE_DISPLAY_DECIMALS)
 * @returns Formatted score string
 */
export function formatScore(score: number, decimals: number = SCORE_DISPLAY_DECIMALS): string {
  return score.toFixed(decimals);
}

/**
 * Genre and cast tags of a movie, trimmed and lower-cased
 */
export function collectTags(movie: Movie): Set<string> {
  const tags = new Set<string>();

  for (const tag of [...(movie.genres ?? []), ...(movie.cast ?? [])]) {
    const normalized = tag.trim().toLowerCase();
    if (normalized.length > 0) {
      tags.add(normalized);
    }
  }

  return tags;
}

/**
 * Calculate tag diversity between two movies
 *
 * Returns value in [0, 1] where:
 * - 1.0 = fully disjoint tag sets
 * - 0.0 = identical tag sets (including both empty)
 *
 * @param a - First movie
 * @param b - Second movie
 * @returns |symmetric difference| / |union|
 */
export function calculateTagDiversity(a: Movie, b: Movie): number {
  const tagsA = collectTags(a);
  const tagsB = collectTags(b);
  const union = new Set([...tagsA, ...tagsB]);

  if (union.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const tag of tagsA) {
    if (tagsB.has(tag)) {
      shared++;
    }
  }

  return (union.size - shared) / union.size;
}

/**
 * Check the candidate set, then the query, before any scoring happens
 *
 * @param candidates - Candidate sequence
 * @param query - Raw query text
 * @returns Normalized query tokens, or the first input error found
 */
export function prepareRankingInput(
  candidates: readonly Movie[],
  query: string
): Result<ReadonlySet<string>, EmptyCandidateSetError | InvalidQueryError> {
  if (candidates.length === 0) {
    return err(new EmptyCandidateSetError());
  }

  const tokens = parseQuery(query);
  if (tokens.isErr()) {
    return err(tokens.error);
  }

  return ok(tokens.value);
}
