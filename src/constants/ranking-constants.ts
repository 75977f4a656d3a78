/**
 * Constants and default values for the movie ranking engine
 *
 * @module ranking-constants
 */

import type { RankingConfig } from '../models/ranking-config.js';

/**
 * Points awarded per matched query token (W_match)
 */
export const DEFAULT_MATCH_WEIGHT = 10;

/**
 * Popularity multiplier (W_pop)
 * Small enough that one token match outweighs ~100 popularity points
 */
export const DEFAULT_POPULARITY_WEIGHT = 0.1;

/**
 * Marking threshold relative to the mean score
 */
export const DEFAULT_RELEVANCE_THRESHOLD_MULTIPLIER = 1.0;

/**
 * Runner-up must beat the amplitude winner's raw score by more than 15%
 */
export const DEFAULT_TUNNELING_MARGIN = 0.15;

/**
 * Default maximum candidate set size per search
 */
export const DEFAULT_MAX_CANDIDATES = 500;

/**
 * Bounds for limits.maxCandidates
 */
export const MIN_MAX_CANDIDATES = 1;
export const MAX_MAX_CANDIDATES = 10000;

/**
 * Relevance scores within this difference are considered tied
 */
export const SCORE_EPSILON = 1e-9;

/**
 * Probabilities within this difference are considered tied
 */
export const PROBABILITY_EPSILON = 1e-12;

/**
 * Score display precision
 */
export const SCORE_DISPLAY_DECIMALS = 3;

/**
 * Environment variable naming the ranking config file
 */
export const CONFIG_PATH_ENV = 'MOVIE_RANK_CONFIG';

/**
 * Config file location relative to the working directory
 */
export const DEFAULT_CONFIG_DIR = '.movierank';
export const DEFAULT_CONFIG_FILE = 'ranking-config.json';

/**
 * Default ranking configuration
 * Used when no custom configuration file is present; frozen at every level
 */
export const DEFAULT_RANKING_CONFIG = Object.freeze({
  version: '1.0',
  scoring: Object.freeze({
    matchWeight: DEFAULT_MATCH_WEIGHT,
    popularityWeight: DEFAULT_POPULARITY_WEIGHT,
  }),
  amplification: Object.freeze({
    relevanceThresholdMultiplier: DEFAULT_RELEVANCE_THRESHOLD_MULTIPLIER,
    tunnelingMargin: DEFAULT_TUNNELING_MARGIN,
  }),
  limits: Object.freeze({
    maxCandidates: DEFAULT_MAX_CANDIDATES,
  }),
}) satisfies RankingConfig;
