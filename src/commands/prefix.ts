import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupPrefixCommand(program: Command): void {
  program
    .command('prefix')
    .description('Show or set the installation prefixes')
    .argument('[dir]', 'directory packages are installed into')
    .argument('[arch-dir]', 'directory compiled files are installed into (default: dir)')
    .option('--global', 'show or set the prefixes of global installs')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (dir: string | undefined, archDir: string | undefined, options: PkgCommandOptions) => {
      await runPkgCommand({
        kind: 'prefix',
        ...(dir ? { prefix: dir } : {}),
        ...(archDir ? { archPrefix: archDir } : {}),
        global: options.global ?? false
      });
    }));
}
