import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupLoadCommand(program: Command): void {
  program
    .command('load')
    .description('Add installed packages and their dependencies to the search path')
    .argument('<names...>', 'names of installed packages')
    .option('--nodeps', 'load without unsatisfied dependencies')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'load', names, noDeps: options.nodeps ?? false });
    }));
}
