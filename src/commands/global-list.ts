import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupGlobalListCommand(program: Command): void {
  program
    .command('global-list')
    .description('Show or set the file of the global package registry')
    .argument('[file]', 'new registry file')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (file: string | undefined) => {
      await runPkgCommand({ kind: 'global-list', ...(file ? { file } : {}) });
    }));
}
