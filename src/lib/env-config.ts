/**
 * Environment Configuration
 *
 * Reads process settings from environment variables, optionally seeded from a .env file.
 */

import { config as loadEnv, type DotenvPopulateInput } from 'dotenv';
import { Result, ok, err, toError } from './result-types.js';
import { ConfigurationError } from './errors/RankingErrors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { CONFIG_PATH_ENV } from '../constants/ranking-constants.js';

/**
 * Settings taken from the environment
 */
export interface EnvironmentSettings {
	/** Ranking config file (MOVIE_RANK_CONFIG) */
	configPath?: string;

	/** Console log threshold (LOG_LEVEL, default: warn) */
	logLevel: LogLevel;

	/** Directory for JSON Lines logs (MOVIE_RANK_LOG_DIR) */
	logDir?: string;
}

/**
 * Configuration Manager
 *
 * Loads .env files and provides type-safe access to environment settings.
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: NodeJS.ProcessEnv = process.env
	) {}

	/**
	 * Load environment variables from .env file
	 *
	 * A missing .env file is not an error.
	 *
	 * @returns Result indicating success or failure
	 */
	loadEnv(): Result<void, ConfigurationError> {
		try {
			const loaded: DotenvPopulateInput = {};
			const result = loadEnv({ path: this.envPath, processEnv: loaded });

			if (result.error) {
				return ok(undefined);
			}

			// Variables already set win over the file
			for (const [key, value] of Object.entries(loaded)) {
				if (this.env[key] === undefined) {
					this.env[key] = value;
				}
			}

			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigurationError('envPath', this.envPath, `failed to load .env file: ${toError(error).message}`)
			);
		}
	}

	/**
	 * Read and validate environment settings
	 */
	getSettings(): Result<EnvironmentSettings, ConfigurationError> {
		const rawLevel = this.getEnvVar('LOG_LEVEL')?.toLowerCase() ?? 'warn';

		if (!isLogLevel(rawLevel)) {
			return err(new ConfigurationError('LOG_LEVEL', rawLevel, 'must be one of debug, info, warn, error'));
		}

		return ok({
			configPath: this.getEnvVar(CONFIG_PATH_ENV),
			logLevel: rawLevel,
			logDir: this.getEnvVar('MOVIE_RANK_LOG_DIR'),
		});
	}

	/**
	 * Get environment variable, treating empty strings as unset
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value ? value : undefined;
	}
}

/**
 * Create a configuration manager and load its .env file
 *
 * @param envPath - Optional path to .env file
 * @returns Configuration manager
 */
export function loadEnvironment(envPath?: string): Result<ConfigurationManager, ConfigurationError> {
	const manager = new ConfigurationManager(envPath);
	return manager.loadEnv().map(() => manager);
}
