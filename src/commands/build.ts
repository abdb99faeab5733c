import { Command } from 'commander';

import type { PkgCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runPkgCommand } from '../cli/run-command.js';

export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build binary packages that install without compiling')
    .argument('<build-dir>', 'directory that receives the binary package archives')
    .argument('<sources...>', 'package archives or directories')
    .option('--nodeps', 'build even when dependencies are not installed')
    .option('-v, --verbose', 'show debug output')
    .action(withErrorHandling(async (buildDir: string, sources: string[], options: PkgCommandOptions) => {
      await runPkgCommand({ kind: 'build', buildDir, sources, noDeps: options.nodeps ?? false });
    }));
}
