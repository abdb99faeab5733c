/**
 * Default ArchiveFetcher
 *
 * Accepts a local directory, a local archive (.tar.gz, .tgz, .tar) or a URL
 * and leaves an unpacked copy of the package inside the staging root. Every
 * fetch gets its own directory, so sources sharing a base name never mix.
 */

import { createWriteStream } from 'fs';
import { mkdtemp } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { basename, join } from 'path';
import * as tar from 'tar';
import { request } from 'undici';

import type { ArchiveFetcher } from '../ports/collaborators.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { copyDirectory, ensureDir, exists, isDirectory, isFile, listDirectories, listFiles } from '../../utils/fs.js';
import { FetchError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const URL_PATTERN = /^\w+:\/\//;
const PACKAGE_NAME_PATTERN = /^[\w-]+$/;

function archiveBaseName(locator: string): string {
  const name = basename(locator.split(/[?#]/)[0] ?? locator);
  const extension = FILE_PATTERNS.ARCHIVE_EXTENSIONS.find(ext => name.endsWith(ext));
  return extension ? name.slice(0, -extension.length) : name;
}

/**
 * Archives usually wrap the package in one top-level directory
 */
async function findPackageRoot(extractedDir: string): Promise<string> {
  if (await exists(join(extractedDir, FILE_PATTERNS.PACKAGE_YML))) {
    return extractedDir;
  }
  const dirs = await listDirectories(extractedDir);
  const files = await listFiles(extractedDir);
  const onlyDir = dirs[0];
  if (dirs.length === 1 && files.length === 0 && onlyDir) {
    return join(extractedDir, onlyDir);
  }
  return extractedDir;
}

export class DefaultArchiveFetcher implements ArchiveFetcher {
  async fetch(locator: string, stagingRoot: string): Promise<string> {
    await ensureDir(stagingRoot);
    const target = await mkdtemp(join(stagingRoot, `${archiveBaseName(locator)}-`));

    if (URL_PATTERN.test(locator)) {
      const archivePath = `${target}-${basename(locator.split(/[?#]/)[0] ?? 'package.tar.gz')}`;
      await this.download(locator, archivePath);
      await this.extract(archivePath, target, locator);
    } else if (await isDirectory(locator)) {
      await copyDirectory(locator, target);
    } else if (await isFile(locator)) {
      await this.extract(locator, target, locator);
    } else if (PACKAGE_NAME_PATTERN.test(locator)) {
      throw new FetchError(locator, `file not found. This looks like a package name; did you mean 'numpkg install --forge ${locator}'?`);
    } else {
      throw new FetchError(locator, 'file not found');
    }

    const packageRoot = await findPackageRoot(target);
    logger.debug(`Staged ${locator} at ${packageRoot}`);
    return packageRoot;
  }

  private async download(url: string, destination: string): Promise<void> {
    logger.debug(`Downloading ${url}`);
    try {
      const { statusCode, body } = await request(url, { maxRedirections: 5 });
      if (statusCode >= 400) {
        await body.dump();
        throw new FetchError(url, `server responded with status ${statusCode}`);
      }
      await pipeline(body, createWriteStream(destination));
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(url, getErrorMessage(error));
    }
  }

  private async extract(archivePath: string, destination: string, locator: string): Promise<void> {
    try {
      await tar.x({ file: archivePath, cwd: destination });
    } catch (error) {
      throw new FetchError(locator, `could not extract archive (${getErrorMessage(error)})`);
    }
  }
}
