import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatPathForDisplay, getTreeConnector } from '../../utils/formatters.js';
import type { InstallResult } from './install-orchestrator.js';

function renderTreeList(items: string[], output: OutputPort, indent: string = '  '): void {
  for (let i = 0; i < items.length; i++) {
    const connector = getTreeConnector(i === items.length - 1);
    output.info(`${indent}${connector}${items[i]}`);
  }
}

export function displayInstallationResults(result: InstallResult, output: OutputPort = resolveOutput()): void {
  const { installed, skipped, failures, scope } = result;

  if (installed.length > 0) {
    output.success(`Installed ${installed.length} package${installed.length === 1 ? '' : 's'} (${scope})`);
    renderTreeList(
      installed.map(pkg => {
        const replaced = pkg.previousVersion ? `, replaced ${pkg.previousVersion}` : '';
        return `${pkg.record.name} ${pkg.record.version} (${formatPathForDisplay(pkg.record.directory)}${replaced})`;
      }),
      output
    );
  }

  if (skipped.length > 0) {
    output.info(`Skipped ${skipped.length}:`);
    renderTreeList(skipped.map(pkg => `${pkg.name} ${pkg.version} (${pkg.reason})`), output);
  }

  if (failures.length > 0) {
    output.error(`Failed ${failures.length}:`);
    for (const failure of failures) {
      const label = failure.name && failure.name !== failure.source ? `${failure.name} (${failure.source})` : failure.source;
      output.info(`   • ${label}: ${failure.error.message}`);
    }
  }

  if (installed.length === 0 && skipped.length === 0 && failures.length === 0) {
    output.info('Nothing to install');
  }
}
