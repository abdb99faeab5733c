/**
 * Build Pipeline
 *
 * Turns package sources into binary packages: archives that carry the
 * compiled files next to the interpreted ones and install without a build
 * step.
 *
 *   stage (fetch + build) -> check deps -> lay out image -> tar.gz in buildDir
 *
 * Best effort per source, like install.
 */

import { mkdtemp } from 'fs/promises';
import { basename, join } from 'path';
import * as tar from 'tar';

import type { ExecutionContext } from '../../types/execution-context.js';
import { PACKAGE_PATHS } from '../../constants/index.js';
import { getPackageDirName } from '../directory.js';
import { effectiveSetOf, loadRegistries } from '../registry/registry-store.js';
import { findUnsatisfiedDependencies } from '../dependency-resolver/index.js';
import { resolveOutput } from '../ports/resolve.js';
import { stagePackage, withStagingDirectory, type StagedPackage } from '../install/staging.js';
import { copyDirectory, copyFile, ensureDir, isDirectory } from '../../utils/fs.js';
import { FileSystemError, UnsatisfiedDependencyError, ValidationError, getErrorMessage } from '../../utils/errors.js';
import { writePackageManifest } from '../../utils/package-manifest.js';
import { logger } from '../../utils/logger.js';

export interface BuildOptions {
  /** Build even when declared dependencies are not installed */
  noDeps?: boolean;
}

export interface BuiltPackage {
  name: string;
  version: string;
  /** Path of the produced .tar.gz */
  archive: string;
  archFileCount: number;
}

export interface BuildFailure {
  source: string;
  name?: string;
  error: Error;
}

export interface BuildResult {
  buildDir: string;
  built: BuiltPackage[];
  failures: BuildFailure[];
}

export function getBinaryArchiveName(name: string, version: string): string {
  return `${getPackageDirName(name, version)}.tar.gz`;
}

/**
 * Write the installable tree of a staged package under `imageRoot`:
 * package.yml, inst/ and the compiled files in src/.
 */
async function layOutImage(staged: StagedPackage, imageRoot: string): Promise<string> {
  const { build, manifest } = staged;
  const dirName = getPackageDirName(manifest.name, manifest.version);
  const imageDir = join(imageRoot, dirName);

  await writePackageManifest(imageDir, manifest);
  const instDir = join(build.packageRoot, PACKAGE_PATHS.INST);
  if (await isDirectory(instDir)) {
    await copyDirectory(instDir, join(imageDir, PACKAGE_PATHS.INST));
  }
  for (const file of build.archFiles) {
    await copyFile(file, join(imageDir, PACKAGE_PATHS.SRC, basename(file)));
  }
  return dirName;
}

async function packImage(imageRoot: string, dirName: string, archive: string): Promise<void> {
  try {
    await tar.c({ gzip: true, file: archive, cwd: imageRoot, portable: true }, [dirName]);
  } catch (error) {
    throw new FileSystemError(`Cannot write ${archive}: ${getErrorMessage(error)}`, { archive });
  }
}

/**
 * Build binary packages from `sources` into `buildDir`.
 *
 * @throws ValidationError when no build directory or no source is given
 * @throws CorruptRegistryError when a registry file cannot be read
 */
export async function buildBinaryPackages(
  buildDir: string,
  sources: string[],
  options: BuildOptions,
  ctx: ExecutionContext
): Promise<BuildResult> {
  if (buildDir.trim().length === 0) {
    throw new ValidationError('No build directory given');
  }
  if (sources.length === 0) {
    throw new ValidationError('No packages given to build');
  }

  const installed = effectiveSetOf(await loadRegistries(ctx.registryPaths));
  const output = resolveOutput(ctx);
  const result: BuildResult = { buildDir, built: [], failures: [] };

  await ensureDir(buildDir);
  await withStagingDirectory(ctx.stagingDirectory, 'build', async stagingRoot => {
    for (const source of sources) {
      const spinner = output.spinner();
      spinner.start(`Building ${source}`);
      let name: string | undefined;
      try {
        const staged = await stagePackage(source, stagingRoot, false, ctx);
        const { manifest } = staged;
        name = manifest.name;

        const unsatisfied = findUnsatisfiedDependencies(
          { name: manifest.name, version: manifest.version, dependencies: manifest.depends },
          installed
        );
        if (unsatisfied.length > 0) {
          if (!options.noDeps) throw new UnsatisfiedDependencyError(unsatisfied);
          for (const requirement of unsatisfied) {
            output.warn(`${manifest.name}: building without ${requirement.requirement}`);
          }
        }

        const imageRoot = await mkdtemp(join(stagingRoot, 'image-'));
        const dirName = await layOutImage(staged, imageRoot);
        const archive = join(buildDir, getBinaryArchiveName(manifest.name, manifest.version));
        await packImage(imageRoot, dirName, archive);

        result.built.push({
          name: manifest.name,
          version: manifest.version,
          archive,
          archFileCount: staged.build.archFiles.length
        });
        spinner.stop(`Built ${manifest.name} ${manifest.version}`);
        logger.info(`Wrote binary package ${archive}`);
      } catch (error) {
        spinner.stop(`Failed to build ${source}`);
        logger.debug(`Building ${source} failed`, { error });
        result.failures.push({
          source,
          ...(name ? { name } : {}),
          error: error instanceof Error ? error : new Error(getErrorMessage(error))
        });
      }
    }
  });

  return result;
}
