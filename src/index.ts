#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { ensureNumpkgDirectories } from './core/directory.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupLoadCommand } from './commands/load.js';
import { setupUnloadCommand } from './commands/unload.js';
import { setupListCommand } from './commands/list.js';
import { setupDescribeCommand } from './commands/describe.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupRebuildCommand } from './commands/rebuild.js';
import { setupBuildCommand } from './commands/build.js';
import { setupTestCommand } from './commands/test.js';
import { setupPrefixCommand } from './commands/prefix.js';
import { setupLocalListCommand } from './commands/local-list.js';
import { setupGlobalListCommand } from './commands/global-list.js';

/**
 * numpkg CLI - Main entry point
 *
 * Installs, loads and manages add-on packages of the numerical environment.
 */

const program = new Command();

program
  .name('numpkg')
  .description('numpkg - package manager for numerical environment add-ons')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

// === PACKAGE COMMANDS ===
setupInstallCommand(program);
setupUninstallCommand(program);
setupLoadCommand(program);
setupUnloadCommand(program);
setupListCommand(program);
setupDescribeCommand(program);
setupUpdateCommand(program);
setupRebuildCommand(program);
setupBuildCommand(program);
setupTestCommand(program);

// === CONFIGURATION ===
setupPrefixCommand(program);
setupLocalListCommand(program);
setupGlobalListCommand(program);

program.hook('preAction', (_thisCommand, actionCommand) => {
  // describe uses --verbose for its own output
  if (actionCommand.name() !== 'describe' && actionCommand.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Running numpkg ${actionCommand.name()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with NUMPKG_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with NUMPKG_VERBOSE=1 for details.');
  process.exit(1);
});

async function initializeNumpkg(): Promise<void> {
  try {
    await ensureNumpkgDirectories();
  } catch (error) {
    logger.error('Failed to initialize numpkg directories', { error });
    console.error('❌ Failed to initialize numpkg directories. Please check permissions.');
    process.exit(1);
  }
}

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  await initializeNumpkg();

  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('numpkg')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
