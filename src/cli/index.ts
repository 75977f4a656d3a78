#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter } from './utils/output.js';
import { createRankCommand } from './commands/rank.js';
import { createCompareCommand } from './commands/compare.js';
import { createConfigCommand } from './commands/config.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('movie-rank')
  .description('Rank movie candidates with a classical or simulated quantum search')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    // Handle verbose and quiet flags
    const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    if (opts.verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
    if (opts.quiet) {
      process.env.LOG_LEVEL = 'error';
    }
  });

// Error handling
program.exitOverride();

// Register commands
program.addCommand(createRankCommand());
program.addCommand(createCompareCommand());
program.addCommand(createConfigCommand());

// Parse arguments
try {
  program.parse(process.argv);
} catch (error) {
  // --help, --version and usage errors are already reported by commander
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  output.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
