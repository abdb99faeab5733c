import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupLocalListCommand(program: Command): void {
  program
    .command('local-list')
    .description('Show or set the file of the local package registry')
    .argument('[file]', 'new registry file')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (file: string | undefined) => {
      await runPkgCommand({ kind: 'local-list', ...(file ? { file } : {}) });
    }));
}
