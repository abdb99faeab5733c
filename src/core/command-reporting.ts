import type { OutputPort } from './ports/output.js';
import { resolveOutput } from './ports/resolve.js';
import type { PkgCommandResult } from './commands.js';
import { displayInstallationResults } from './install/install-reporting.js';
import { reportUninstallResult } from './uninstall/uninstall-reporter.js';
import { printPackageList, printRemotePackageList } from './list/list-printers.js';
import { printPackageDescriptions } from './describe/describe-printer.js';
import { formatPathForDisplay } from '../utils/formatters.js';

function names(records: Array<{ name: string }>): string {
  return records.map(record => record.name).join(', ');
}

/**
 * Print the outcome of one command
 */
export function reportCommandResult(result: PkgCommandResult, output: OutputPort = resolveOutput()): void {
  switch (result.kind) {
    case 'install':
      displayInstallationResults(result.result, output);
      return;
    case 'uninstall':
      reportUninstallResult(result.result, output);
      return;
    case 'load': {
      const { activated, alreadyLoaded } = result.result;
      if (activated.length > 0) output.success(`Loaded ${names(activated)}`);
      if (alreadyLoaded.length > 0) output.info(`Already loaded: ${alreadyLoaded.join(', ')}`);
      return;
    }
    case 'unload': {
      const { deactivated, notLoaded, overridden } = result.result;
      if (deactivated.length > 0) output.success(`Unloaded ${names(deactivated)}`);
      if (notLoaded.length > 0) output.info(`Not loaded: ${notLoaded.join(', ')}`);
      if (overridden.length > 0) output.warn(`Still loaded and depending on them: ${overridden.join(', ')}`);
      return;
    }
    case 'list':
      printPackageList(result.installed, output);
      return;
    case 'list-remote':
      printRemotePackageList(result.names, output);
      return;
    case 'describe':
      printPackageDescriptions(result.descriptions, output);
      return;
    case 'update': {
      const { updates, warnings, installs } = result.result;
      for (const warning of warnings) output.warn(warning);
      if (updates.length === 0) {
        output.success('All packages are up to date');
        return;
      }
      for (const update of updates) {
        output.step(`${update.name}: ${update.installedVersion} -> ${update.latestVersion} (${update.scope})`);
      }
      for (const install of installs) displayInstallationResults(install, output);
      return;
    }
    case 'rebuild': {
      const { registry } = result.result;
      output.success(`Rebuilt ${registry.scope} registry with ${registry.records.size} package${registry.records.size === 1 ? '' : 's'}`);
      output.info(`   ${formatPathForDisplay(registry.path)}`);
      return;
    }
    case 'build': {
      const { built, failures } = result.result;
      for (const pkg of built) {
        const compiled = pkg.archFileCount > 0 ? `, ${pkg.archFileCount} compiled file${pkg.archFileCount === 1 ? '' : 's'}` : '';
        output.success(`Built ${pkg.name} ${pkg.version}${compiled}`);
        output.info(`   ${formatPathForDisplay(pkg.archive)}`);
      }
      for (const failure of failures) {
        output.error(`${failure.name ?? failure.source}: ${failure.error.message}`);
      }
      return;
    }
    case 'test': {
      const { reports, passed, failed } = result.result;
      for (const report of reports) {
        const line = `${report.name}: ${report.passed} passed, ${report.failed} failed`;
        if (report.failed > 0) output.error(line);
        else output.success(line);
      }
      output.info(`Summary: ${passed} passed, ${failed} failed`);
      return;
    }
    case 'prefix':
      output.message(`Installation prefix (${result.settings.scope}): ${result.settings.prefix}`);
      output.message(`Architecture dependent prefix (${result.settings.scope}): ${result.settings.archPrefix}`);
      return;
    case 'registry-path':
      output.message(`${result.scope === 'global' ? 'Global' : 'Local'} package list: ${result.path}`);
      return;
  }
}
