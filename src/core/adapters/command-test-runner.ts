/**
 * Default PackageTestRunner
 *
 * Runs the configured test command once per package directory. Each
 * directory counts as one passed or failed test block.
 */

import { spawn } from 'child_process';
import type { PackageTestRunner, PackageTestSummary } from '../ports/collaborators.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const DIR_PLACEHOLDER = '{dir}';

function runCommand(command: string, args: string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', code => resolve(code ?? 1));
  });
}

export class CommandTestRunner implements PackageTestRunner {
  constructor(private readonly command: readonly string[] | undefined) {}

  async run(name: string, directories: string[]): Promise<PackageTestSummary> {
    const [executable, ...template] = this.command ?? [];
    if (!executable) {
      throw new ConfigError(`No test command configured; set 'testCommand' in the numpkg configuration to test '${name}'`);
    }

    const summary: PackageTestSummary = { passed: 0, failed: 0 };
    for (const directory of directories) {
      const args = template.map(part => part.split(DIR_PLACEHOLDER).join(directory));
      logger.debug(`Running ${executable} ${args.join(' ')}`);
      const exitCode = await runCommand(executable, args);
      if (exitCode === 0) {
        summary.passed++;
      } else {
        summary.failed++;
      }
    }
    return summary;
  }
}
