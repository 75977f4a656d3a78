/**
 * Compare Command
 *
 * Runs both rankers over the same candidate file and prints their selections side by side.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatScore } from '../../lib/ranking-utils.js';
import { loadCandidates } from '../../services/candidate-loader.js';
import { MovieSearchService } from '../../services/movie-search.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { createCommandContext } from '../utils/context.js';

interface CompareCommandOptions {
  config?: string;
  json?: boolean;
}

export function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare classical and quantum ranking on the same candidates')
    .argument('<file>', 'JSON file with candidate movies')
    .argument('<query>', 'Free-text query')
    .option('-c, --config <path>', 'Ranking configuration file')
    .action((file: string, query: string, _options: CompareCommandOptions, command: Command) => {
      const options = command.optsWithGlobals<CompareCommandOptions>();
      const output = new OutputFormatter(options.json ? OutputFormat.JSON : OutputFormat.HUMAN);
      executeCompare(file, query, options, output);
    });
}

function executeCompare(
  file: string,
  query: string,
  options: CompareCommandOptions,
  output: OutputFormatter
): void {
  const context = createCommandContext(options.config);
  if (context.isErr()) {
    output.error('Configuration error', context.error);
    process.exit(1);
  }

  const candidates = loadCandidates(file);
  if (candidates.isErr()) {
    output.error('Could not load candidates', candidates.error);
    process.exit(1);
  }

  const service = new MovieSearchService(context.value.configService.getConfig(), context.value.logger);
  const comparison = service.compare(candidates.value, query);
  if (comparison.isErr()) {
    output.error('Comparison failed', comparison.error);
    process.exit(1);
  }

  const { classical, quantum, agree, diversity } = comparison.value;

  if (output.isJson()) {
    output.success('Comparison complete', { query, comparison: comparison.value });
    return;
  }

  console.log(chalk.cyan(`\nQuery: "${query}"`));
  console.log(chalk.gray(`${candidates.value.length} candidates\n`));

  output.table(
    ['Mode', 'Index', 'Title', 'Score', 'Iterations'],
    [classical, quantum].map(result => [
      result.mode,
      result.index,
      candidates.value[result.index].title,
      formatScore(result.diagnostics.topScore),
      result.diagnostics.iterations,
    ])
  );

  console.log();
  console.log(agree ? chalk.green('Both modes agree') : chalk.yellow('Modes disagree'));
  console.log(chalk.gray(`Tag diversity: ${formatScore(diversity)}`));
}
