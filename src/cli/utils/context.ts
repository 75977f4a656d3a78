/**
 * Shared setup for CLI commands: environment, logger, ranking configuration
 */

import { loadEnvironment } from '../../lib/env-config.js';
import { Logger } from '../../lib/logger.js';
import { err, ok, type Result } from '../../lib/result-types.js';
import type { RankingError } from '../../lib/errors/RankingErrors.js';
import { ConfigurationService } from '../../services/configuration-service.js';

export interface CommandContext {
  logger: Logger;
  configService: ConfigurationService;
}

/**
 * Build the command context
 *
 * @param configPath - --config override; falls back to MOVIE_RANK_CONFIG, then the default path
 */
export function createCommandContext(configPath?: string): Result<CommandContext, RankingError> {
  const environment = loadEnvironment();
  if (environment.isErr()) {
    return err(environment.error);
  }

  const settings = environment.value.getSettings();
  if (settings.isErr()) {
    return err(settings.error);
  }

  const logger = new Logger({
    logDir: settings.value.logDir,
    consoleLevel: settings.value.logLevel,
  });

  const configService = new ConfigurationService(configPath ?? settings.value.configPath, logger);

  return ok({ logger, configService });
}
