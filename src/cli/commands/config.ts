import { Command } from 'commander';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { createCommandContext } from '../utils/context.js';

interface ConfigOptions {
  config?: string;
  json?: boolean;
}

/**
 * Configuration command implementation
 */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the effective ranking configuration')
    .option('-c, --config <path>', 'Ranking configuration file')
    .action((_options: ConfigOptions, command: Command) => {
      const options = command.optsWithGlobals<ConfigOptions>();
      const output = new OutputFormatter(options.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const context = createCommandContext(options.config);
      if (context.isErr()) {
        output.error('Configuration error', context.error);
        process.exit(1);
      }

      const { configService } = context.value;
      const config = configService.getConfig();

      output.success('Ranking configuration', {
        source: configService.isLoadedFromFile() ? configService.getConfigPath() : 'defaults',
        version: config.version,
        scoring: config.scoring,
        amplification: config.amplification,
        limits: config.limits,
        warnings: configService.getWarnings().length,
      });
    });
}
