import type { PkgCommand } from '../core/commands.js';
import { executeCommand, hasFailures } from '../core/commands.js';
import { reportCommandResult } from '../core/command-reporting.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { createCliExecutionContext } from './context.js';

/**
 * Run one command with the CLI context and print its outcome. A batch that
 * finished with failures sets a non-zero exit code without throwing.
 */
export async function runPkgCommand(command: PkgCommand): Promise<void> {
  const ctx = await createCliExecutionContext();
  const result = await executeCommand(command, ctx);
  reportCommandResult(result, resolveOutput(ctx));
  if (hasFailures(result)) {
    process.exitCode = 1;
  }
}
