/**
 * Default PathActivator
 *
 * Keeps the environment's package search path in a YAML file that the
 * environment reads when it starts. Newly activated directories go to the
 * front, so a package shadows the dependencies loaded before it. A file
 * that cannot be read as a path list is reported, never overwritten.
 */

import * as yaml from 'js-yaml';
import type { PathActivator } from '../ports/collaborators.js';
import { exists, readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { FileSystemError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isMapping } from '../../utils/validation/mapping.js';

const HEADER_COMMENT = '# Search path entries activated by numpkg. Do not edit manually.';

function packageDirectories(directory: string, archDirectory: string): string[] {
  return [directory, archDirectory].filter(dir => dir.length > 0);
}

export class SearchPathFileActivator implements PathActivator {
  constructor(private readonly filePath: string) {}

  async activeDirectories(): Promise<string[]> {
    if (!(await exists(this.filePath))) {
      return [];
    }
    const content = await readTextFile(this.filePath);
    let parsed: unknown;
    try {
      parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
    } catch (error) {
      throw new FileSystemError(`Malformed search path file ${this.filePath}: ${getErrorMessage(error)}`, { path: this.filePath });
    }
    if (parsed === undefined || parsed === null) {
      return [];
    }
    if (!isMapping(parsed) || !Array.isArray(parsed.path)) {
      throw new FileSystemError(`Malformed search path file ${this.filePath}: expected a 'path' list`, { path: this.filePath });
    }
    const entries: unknown[] = parsed.path;
    if (!entries.every((entry): entry is string => typeof entry === 'string')) {
      throw new FileSystemError(`Malformed search path file ${this.filePath}: every entry must be a directory`, { path: this.filePath });
    }
    return entries;
  }

  async activate(directory: string, archDirectory: string): Promise<void> {
    const current = await this.activeDirectories();
    const added = packageDirectories(directory, archDirectory).filter(dir => !current.includes(dir));
    if (added.length === 0) return;
    await this.write([...added, ...current]);
    logger.debug(`Activated ${added.join(', ')}`);
  }

  async deactivate(directory: string, archDirectory: string): Promise<void> {
    const removed = new Set(packageDirectories(directory, archDirectory));
    const current = await this.activeDirectories();
    const remaining = current.filter(dir => !removed.has(dir));
    if (remaining.length === current.length) return;
    await this.write(remaining);
    logger.debug(`Deactivated ${Array.from(removed).join(', ')}`);
  }

  private async write(entries: string[]): Promise<void> {
    const body = yaml.dump({ path: entries }, { indent: 2, noArrayIndent: true, lineWidth: -1 });
    await writeTextFileAtomic(this.filePath, `${HEADER_COMMENT}\n${body}`);
  }
}
