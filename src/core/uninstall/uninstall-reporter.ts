import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import type { UninstallPipelineResult } from './uninstall-pipeline.js';

/**
 * Report uninstall results
 */
export function reportUninstallResult(result: UninstallPipelineResult, output: OutputPort = resolveOutput()): void {
  for (const record of result.removed) {
    output.success(`Uninstalled ${record.name} ${record.version} (${result.scope})`);
    output.info(`   ${formatPathForDisplay(record.directory)}`);
  }

  if (result.overridden.length > 0) {
    output.warn(`Left with a missing dependency: ${result.overridden.join(', ')}`);
  }
}
