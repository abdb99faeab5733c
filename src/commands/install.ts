import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install packages from archives, directories or URLs')
    .argument('<sources...>', 'package archives, directories or URLs; package names with --forge')
    .option('--nodeps', 'install even when dependencies are not satisfied')
    .option('--local', 'install into the local (per-user) registry')
    .option('--global', 'install into the global (system-wide) registry')
    .option('--forge', 'download the latest version of each named package from the package index')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (sources: string[], options: PkgCommandOptions) => {
      await runPkgCommand({
        kind: 'install',
        sources,
        options: {
          noDeps: options.nodeps ?? false,
          preferLocal: options.local ?? false,
          preferGlobal: options.global ?? false,
          forge: options.forge ?? false
        }
      });
    }));
}
