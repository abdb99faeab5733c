import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .alias('un')
    .description('Remove installed packages')
    .argument('<names...>', 'names of the packages to uninstall')
    .option('--nodeps', 'uninstall even when other packages depend on them')
    .option('--global', 'uninstall from the global registry instead of the local one')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({
        kind: 'uninstall',
        names,
        options: { noDeps: options.nodeps ?? false, preferGlobal: options.global ?? false }
      });
    }));
}
