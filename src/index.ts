#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupBuildCommand } from './commands/build.js';
import { setupInstallCommand } from './commands/install.js';
import { setupListCommand } from './commands/list.js';

/**
 * typm CLI - Main entry point
 *
 * Builds Typst packages from a local typst.toml and installs them from git.
 */

const program = new Command();

program
  .name('typm')
  .description('Build, install, and list Typst packages/templates')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

setupBuildCommand(program);
setupInstallCommand(program);
setupListCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with TYPM_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with TYPM_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  // No arguments: show help and exit successfully
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }

  await program.parseAsync();
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('typm')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
