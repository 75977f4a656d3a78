/**
 * Configuration service for the movie ranking engine
 * Handles loading and validation of ranking configuration
 *
 * @module configuration-service
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import {
  DEFAULT_CONFIG_DIR,
  DEFAULT_CONFIG_FILE,
  DEFAULT_RANKING_CONFIG,
} from '../constants/ranking-constants.js';
import { validateRankingConfig, hasExtremeWeights } from '../lib/ranking-utils.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { toError } from '../lib/result-types.js';
import type { RankingConfig } from '../models/ranking-config.js';

/**
 * Deep copy of the defaults so callers can mutate their config freely
 */
function defaultConfig(): RankingConfig {
  return {
    version: DEFAULT_RANKING_CONFIG.version,
    scoring: { ...DEFAULT_RANKING_CONFIG.scoring },
    amplification: { ...DEFAULT_RANKING_CONFIG.amplification },
    limits: { ...DEFAULT_RANKING_CONFIG.limits },
  };
}

/**
 * Configuration service manages ranking configuration
 *
 * Features:
 * - Load configuration from JSON file
 * - Validate configuration on load
 * - Detect extreme weights and generate warnings
 * - Fallback to default config on errors
 */
export class ConfigurationService {
  private config: RankingConfig;
  private configPath: string;
  private warnings: string[] = [];
  private loadedFromFile = false;
  private logger: Logger;

  /**
   * Create a new ConfigurationService
   *
   * @param configPath - Optional path to config file (defaults to .movierank/ranking-config.json)
   * @param logger - Logger for load failures and warnings
   */
  constructor(configPath?: string, logger: Logger = defaultLogger) {
    this.logger = logger;
    this.configPath = configPath || this.getDefaultConfigPath();
    this.config = this.loadConfig();
    this.detectExtremeWeights();
  }

  /**
   * Get the current ranking configuration
   */
  getConfig(): RankingConfig {
    return this.config;
  }

  /**
   * Get configuration warnings (e.g., extreme weights)
   */
  getWarnings(): string[] {
    return this.warnings;
  }

  /**
   * Path the configuration was (or would have been) read from
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Whether the current configuration came from the file rather than defaults
   */
  isLoadedFromFile(): boolean {
    return this.loadedFromFile;
  }

  /**
   * Load configuration from file or return default
   */
  private loadConfig(): RankingConfig {
    if (!existsSync(this.configPath)) {
      return defaultConfig();
    }

    try {
      const fileContent = readFileSync(this.configPath, 'utf-8');
      const parsedConfig: unknown = JSON.parse(fileContent);

      const validationResult = validateRankingConfig(parsedConfig);

      if (validationResult.isErr()) {
        this.logger.warn('Invalid ranking configuration, falling back to defaults', {
          path: this.configPath,
          error: validationResult.error.message,
        });
        return defaultConfig();
      }

      this.loadedFromFile = true;
      return validationResult.value;
    } catch (error) {
      this.logger.warn('Failed to load ranking configuration, falling back to defaults', {
        path: this.configPath,
        error: toError(error).message,
      });
      return defaultConfig();
    }
  }

  /**
   * Detect extreme weights and generate warnings
   */
  private detectExtremeWeights(): void {
    this.warnings = [];

    if (hasExtremeWeights(this.config)) {
      const { matchWeight, popularityWeight } = this.config.scoring;

      if (matchWeight === 0) {
        this.warnings.push('Extreme weight detected: matchWeight = 0 (ranking by popularity only)');
      }
      if (popularityWeight === 0) {
        this.warnings.push('Extreme weight detected: popularityWeight = 0 (popularity ignored in scores)');
      }
      if (this.config.amplification.tunnelingMargin === 0) {
        this.warnings.push('Extreme weight detected: tunnelingMargin = 0 (any stronger runner-up overrides amplification)');
      }
    }

    for (const warning of this.warnings) {
      this.logger.warn(warning, { path: this.configPath });
    }
  }

  /**
   * Get default config path
   */
  private getDefaultConfigPath(): string {
    return join(process.cwd(), DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
  }
}
