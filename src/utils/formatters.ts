import { homedir } from 'os';
import { isAbsolute, relative, sep } from 'path';
import type { RegistryScope } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user: paths under the home
 * directory use tilde notation, other absolute paths are shown as is.
 *
 * @example
 * formatPathForDisplay('/home/user/.numpkg/packages/signal-1.4.5', '/home/user') // => '~/.numpkg/packages/signal-1.4.5'
 */
export function formatPathForDisplay(path: string, home: string = homedir()): string {
  if (!isAbsolute(path) || !home) {
    return path;
  }
  const rel = relative(home, path);
  if (rel === '') {
    return '~';
  }
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return path;
  }
  return `~${sep}${rel}`;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format a registry scope as a tag (e.g., " [global]" or " [local]")
 */
export function formatScopeTag(scope: RegistryScope): string {
  return scope === 'global' ? ' [global]' : ' [local]';
}

/**
 * Render rows as left-aligned columns separated by two spaces
 */
export function formatColumns(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map(row =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
      .trimEnd()
  );
}
