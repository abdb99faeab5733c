import { promises as fs, type Stats } from 'fs';
import { join, dirname, basename, relative } from 'path';
import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system helpers. Every failure that is not an expected "missing
 * path" surfaces as a FileSystemError naming the path involved.
 */

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(path);
  } catch {
    return undefined;
  }
}

export async function exists(path: string): Promise<boolean> {
  return (await statOrUndefined(path)) !== undefined;
}

export async function isDirectory(path: string): Promise<boolean> {
  return (await statOrUndefined(path))?.isDirectory() ?? false;
}

export async function isFile(path: string): Promise<boolean> {
  return (await statOrUndefined(path))?.isFile() ?? false;
}

export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Cannot create directory ${path}`, { path, error });
  }
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new FileSystemError(`Cannot read ${path}`, { path, error });
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, 'utf8');
    logger.debug(`Wrote ${path}`);
  } catch (error) {
    if (error instanceof FileSystemError) throw error;
    throw new FileSystemError(`Cannot write ${path}`, { path, error });
  }
}

/**
 * Write through a sibling temp file renamed over the target, so readers see
 * the old content or the new one and never a partial file.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Replaced ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Cannot write ${path}`, { path, error });
  }
}

export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
  } catch (error) {
    throw new FileSystemError(`Cannot copy ${src} to ${dest}`, { src, dest, error });
  }
}

/**
 * Copy a tree file by file, leaving out junk files (.DS_Store, Thumbs.db)
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  await ensureDir(dest);
  for await (const filePath of walkFiles(src)) {
    await copyFile(filePath, join(dest, relative(src, filePath)));
  }
  logger.debug(`Copied ${src} to ${dest}`);
}

/**
 * Delete a file or a whole tree; a path that is already gone is fine
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true });
    logger.debug(`Removed ${path}`);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return;
    throw new FileSystemError(`Cannot remove ${path}`, { path, error });
  }
}

async function readEntries(dirPath: string) {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => !isJunk(entry.name))
      .sort((a, b) => a.name.localeCompare(b.name));
  } catch (error) {
    throw new FileSystemError(`Cannot list ${dirPath}`, { dirPath, error });
  }
}

/**
 * Names of the plain files directly inside `dirPath`, sorted
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  return (await readEntries(dirPath)).filter(entry => entry.isFile()).map(entry => entry.name);
}

/**
 * Names of the subdirectories directly inside `dirPath`, sorted
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  return (await readEntries(dirPath)).filter(entry => entry.isDirectory()).map(entry => entry.name);
}

/**
 * Absolute paths of every file below `dirPath`, depth first in name order
 */
export async function* walkFiles(dirPath: string): AsyncGenerator<string> {
  for (const entry of await readEntries(dirPath)) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isFile()) {
      yield fullPath;
    } else if (entry.isDirectory()) {
      yield* walkFiles(fullPath);
    }
  }
}

/**
 * Writes plain JSON, which JSONC readers accept
 */
export async function writeJsoncFile(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, `${JSON.stringify(data, null, 2)}\n`);
}

/**
 * Parse a JSON file that may carry comments and trailing commas
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(await readTextFile(path), errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    throw new FileSystemError(`Cannot parse ${path} as JSON`, { path, errors });
  }
  return result;
}
