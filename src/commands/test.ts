import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupTestCommand(program: Command): void {
  program
    .command('test')
    .description('Run the self tests of installed packages')
    .argument('<names...>', 'packages to test')
    .option('--nodeps', 'load the packages without unsatisfied dependencies')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'test', names, noDeps: options.nodeps ?? false });
    }));
}
