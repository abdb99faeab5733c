/**
 * Default BuildToolchain
 *
 * Runs `make` in the package's src/ directory when it carries a Makefile,
 * then reports what the package provides: interpreted files under inst/
 * and compiled files left in src/.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { extname, join, relative } from 'path';

import type { BuildManifest, BuildToolchain } from '../ports/collaborators.js';
import { ARCH_FILE_EXTENSIONS, FILE_PATTERNS, PACKAGE_PATHS } from '../../constants/index.js';
import { exists, isDirectory, walkFiles } from '../../utils/fs.js';
import { BuildError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { readPackageManifest } from '../../utils/package-manifest.js';

const execFileAsync = promisify(execFile);

function isArchFile(filePath: string): boolean {
  const extension = extname(filePath);
  return ARCH_FILE_EXTENSIONS.some(ext => ext === extension);
}

function describeExecError(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr.length > 0) return stderr;
  }
  return getErrorMessage(error);
}

async function collectFiles(dir: string, filter: (file: string) => boolean = () => true): Promise<string[]> {
  if (!(await isDirectory(dir))) return [];
  const files: string[] = [];
  for await (const file of walkFiles(dir)) {
    if (filter(file)) files.push(file);
  }
  return files;
}

export class MakeBuildToolchain implements BuildToolchain {
  constructor(private readonly makeCommand: string = 'make') {}

  async build(stagingPath: string): Promise<BuildManifest> {
    const manifest = await readPackageManifest(stagingPath);
    const srcDir = join(stagingPath, PACKAGE_PATHS.SRC);

    if (await exists(join(srcDir, FILE_PATTERNS.MAKEFILE))) {
      logger.debug(`Building ${manifest.name} in ${srcDir}`);
      try {
        await execFileAsync(this.makeCommand, ['-C', srcDir], { env: process.env });
      } catch (error) {
        throw new BuildError(stagingPath, describeExecError(error));
      }
    }

    const instDir = join(stagingPath, PACKAGE_PATHS.INST);
    const providedFiles = (await collectFiles(instDir)).map(file => relative(instDir, file));
    const archFiles = await collectFiles(srcDir, isArchFile);

    return {
      name: manifest.name,
      version: manifest.version,
      packageRoot: stagingPath,
      providedFiles,
      archFiles
    };
  }
}
