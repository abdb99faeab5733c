import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * Output port of a context; plain console output when it carries none
 */
export function resolveOutput(ctx?: Pick<ExecutionContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}
