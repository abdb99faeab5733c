import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatColumns, formatPathForDisplay, formatScopeTag } from '../../utils/formatters.js';
import type { ListPackageReport } from './list-pipeline.js';

const LOADED_MARK = '*';

/**
 * Print installed packages as a table; loaded packages are marked with `*`.
 */
export function printPackageList(reports: ListPackageReport[], output: OutputPort = resolveOutput()): void {
  if (reports.length === 0) {
    output.info('No packages installed.');
    return;
  }

  const rows = [
    ['Package Name', 'Version', 'Installation directory'],
    ...reports.map(({ record, scope, loaded }) => [
      `${record.name}${loaded ? ` ${LOADED_MARK}` : ''}`,
      record.version,
      `${formatPathForDisplay(record.directory)}${formatScopeTag(scope)}`
    ])
  ];
  for (const line of formatColumns(rows)) {
    output.message(line);
  }
}

export function printRemotePackageList(names: string[], output: OutputPort = resolveOutput()): void {
  if (names.length === 0) {
    output.info('The package index lists no packages.');
    return;
  }
  for (const name of names) {
    output.message(name);
  }
}
