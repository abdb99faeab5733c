import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

/**
 * Rich output only for a terminal outside CI; pipes and CI logs get plain lines
 */
function pickOutput(interactive: boolean | undefined): OutputPort {
  const tty = interactive ?? (process.stdout.isTTY === true && process.env.CI !== 'true');
  return tty ? createClackOutput() : consoleOutput;
}

/**
 * Execution context for one CLI invocation
 */
export async function createCliExecutionContext(
  options: ExecutionOptions & { interactive?: boolean } = {}
): Promise<ExecutionContext> {
  const { interactive, ...rest } = options;
  return await createExecutionContext({ ...rest, output: rest.output ?? pickOutput(interactive) });
}
