import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupRebuildCommand(program: Command): void {
  program
    .command('rebuild')
    .description('Regenerate a package registry from the installed package directories')
    .argument('[names...]', 'only register these packages')
    .option('--local', 'rebuild the local registry')
    .option('--global', 'rebuild the global registry')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({
        kind: 'rebuild',
        names,
        preferLocal: options.local ?? false,
        preferGlobal: options.global ?? false
      });
    }));
}
