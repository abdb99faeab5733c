import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupUnloadCommand(program: Command): void {
  program
    .command('unload')
    .description('Remove packages from the search path')
    .argument('<names...>', 'names of installed packages')
    .option('--nodeps', 'unload even when loaded packages depend on them')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'unload', names, noDeps: options.nodeps ?? false });
    }));
}
