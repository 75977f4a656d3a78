/**
 * Configuration models for the movie ranking engine
 *
 * @module ranking-config
 */

/**
 * Complete ranking configuration
 */
export interface RankingConfig {
  /**
   * Config schema version (e.g., "1.0")
   * Used for backwards compatibility
   */
  version: string;

  /**
   * Relevance scorer weights
   */
  scoring: ScoringConfig;

  /**
   * Amplitude amplification parameters
   */
  amplification: AmplificationConfig;

  /**
   * Input-size limits enforced by the search service
   */
  limits: LimitsConfig;
}

/**
 * Relevance scorer weights
 */
export interface ScoringConfig {
  /**
   * Points per query token found in title + overview (W_match)
   * Must be >= 0
   */
  matchWeight: number;

  /**
   * Multiplier applied to catalog popularity (W_pop)
   * Must be >= 0
   */
  popularityWeight: number;
}

/**
 * Quantum-simulated ranker parameters
 */
export interface AmplificationConfig {
  /**
   * Candidates scoring strictly above mean * multiplier are marked for the oracle
   * Must be > 0
   */
  relevanceThresholdMultiplier: number;

  /**
   * Relative margin the runner-up's raw score must exceed to replace the winner
   * e.g. 0.15 = runner-up must score more than 15% above the selection
   * Must be >= 0
   */
  tunnelingMargin: number;
}

export interface LimitsConfig {
  /**
   * Maximum candidate set size accepted per search
   * Must be >= 1 and <= 10000
   * Default: 500
   */
  maxCandidates: number;
}
