#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupSolveCommand } from './commands/solve.js';
import { setupConfigCommand } from './commands/config.js';

/**
 * depprobe CLI - Main entry point
 *
 * Finds the real dependencies of Python packages by installing every
 * matching release into a scratch virtualenv and reading back what pip
 * recorded.
 */

const program = new Command();

program
  .name('depprobe')
  .description('Probe Python package releases for their installed dependencies')
  .version(getVersion())
  .option('--verbose', 'enable debug logging')
  .configureHelp({ sortSubcommands: true });

setupSolveCommand(program);
setupConfigCommand(program);

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('depprobe')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
