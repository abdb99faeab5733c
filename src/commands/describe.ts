import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupDescribeCommand(program: Command): void {
  program
    .command('describe')
    .description('Show metadata, dependencies and load status of installed packages')
    .argument('[names...]', 'packages to describe (default: all installed)')
    .option('-v, --verbose', 'also list the files each package provides')
    .action(withErrorHandling(async (names: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'describe', names, verbose: options.verbose ?? false });
    }));
}
