/**
 * Rank Command
 *
 * Picks one movie from a candidate file with the classical or quantum ranker.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { Movie } from '../../models/movie.js';
import { RANKING_MODES, isRankingMode, type SearchOutcome } from '../../models/ranking-result.js';
import { formatScore } from '../../lib/ranking-utils.js';
import { loadCandidates } from '../../services/candidate-loader.js';
import { MovieSearchService } from '../../services/movie-search.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { createCommandContext } from '../utils/context.js';

interface RankCommandOptions {
  mode: string;
  year?: string;
  config?: string;
  json?: boolean;
}

export function createRankCommand(): Command {
  return new Command('rank')
    .description('Select the best-matching movie from a candidate file')
    .argument('<file>', 'JSON file with candidate movies')
    .argument('<query>', 'Free-text query')
    .addOption(
      new Option('-m, --mode <mode>', 'Ranking strategy').choices([...RANKING_MODES]).default('classical')
    )
    .option('-y, --year <yyyy>', 'Likely release year; an exact title/year match skips ranking')
    .option('-c, --config <path>', 'Ranking configuration file')
    .action((file: string, query: string, _options: RankCommandOptions, command: Command) => {
      const options = command.optsWithGlobals<RankCommandOptions>();
      const output = new OutputFormatter(options.json ? OutputFormat.JSON : OutputFormat.HUMAN);
      executeRank(file, query, options, output);
    });
}

function executeRank(
  file: string,
  query: string,
  options: RankCommandOptions,
  output: OutputFormatter
): void {
  if (!isRankingMode(options.mode)) {
    output.error(`Unknown ranking mode: ${options.mode}`);
    process.exit(1);
  }
  const mode = options.mode;

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
  const outcome = service.search(candidates.value, query, { mode, year: options.year });
  if (outcome.isErr()) {
    output.error('Ranking failed', outcome.error);
    process.exit(1);
  }

  if (output.isJson()) {
    output.success('Ranking complete', {
      query,
      outcome: outcome.value,
      movie: candidates.value[outcome.value.index],
    });
    return;
  }

  printOutcome(query, candidates.value, outcome.value);
}

function printOutcome(query: string, candidates: readonly Movie[], outcome: SearchOutcome): void {
  const movie = candidates[outcome.index];

  console.log(chalk.cyan(`\nQuery: "${query}"`));
  console.log(chalk.gray(`${candidates.length} candidates, matched by ${outcome.matchedBy}\n`));
  console.log(chalk.bold.white(`#${outcome.index} ${movie.title}`) + chalk.gray(` (id ${movie.id})`));

  if (outcome.matchedBy === 'title-year') {
    console.log(chalk.gray(`   Exact title and release year match (${movie.releaseDate ?? 'unknown date'})`));
    return;
  }

  const { diagnostics } = outcome.ranking;
  console.log(
    chalk.gray(`   Score: ${formatScore(diagnostics.topScore)}, Iterations: ${diagnostics.iterations}`)
  );

  if (diagnostics.probability !== undefined) {
    console.log(
      chalk.gray(
        `   Probability: ${formatScore(diagnostics.probability)}, Marked: ${diagnostics.markedCount ?? 0}` +
          `, Tunneled: ${diagnostics.tunneled ? 'yes' : 'no'}`
      )
    );
  }

  if (movie.overview) {
    console.log(chalk.dim(`   ${movie.overview}`));
  }
  console.log();
}
