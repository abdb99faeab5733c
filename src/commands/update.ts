import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Reinstall packages for which the package index has a newer version')
    .argument('[names...]', 'packages to update (default: all installed)')
    .option('--nodeps', 'install updates even when dependencies are not satisfied')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'update', names, noDeps: options.nodeps ?? false });
    }));
}
