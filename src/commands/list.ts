import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed packages; loaded packages are marked with *')
    .argument('[names...]', 'only list these packages')
    .option('--forge', 'list the packages available from the package index')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'list', names, forge: options.forge ?? false });
    }));
}
