import { mkdtemp } from 'fs/promises';
import { join } from 'path';
import type { PackageManifest } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { BuildManifest } from '../ports/collaborators.js';
import { ensureDir, exists, remove } from '../../utils/fs.js';
import { InvalidPackageError } from '../../utils/errors.js';
import { getManifestPath, readPackageManifest } from '../../utils/package-manifest.js';
import { logger } from '../../utils/logger.js';

export interface StagedPackage {
  /** Source as given on the command line */
  source: string;
  manifest: PackageManifest;
  build: BuildManifest;
}

/**
 * Run `fn` with a fresh staging directory that is removed afterwards,
 * whether `fn` succeeds or throws.
 */
export async function withStagingDirectory<T>(
  parentDir: string,
  operation: string,
  fn: (stagingRoot: string) => Promise<T>
): Promise<T> {
  await ensureDir(parentDir);
  const stagingRoot = await mkdtemp(join(parentDir, `${operation}-`));
  logger.debug(`Created staging directory ${stagingRoot}`);
  try {
    return await fn(stagingRoot);
  } finally {
    await remove(stagingRoot);
  }
}

async function resolveLocator(source: string, forge: boolean, ctx: ExecutionContext): Promise<string> {
  if (!forge) return source;
  const { index } = ctx.collaborators;
  const version = await index.latestVersion(source);
  logger.debug(`Resolved ${source} to version ${version} through the package index`);
  return index.downloadUrl(source, version);
}

/**
 * Fetch and build one package source inside `stagingRoot`.
 *
 * @param forge treat `source` as a package name to look up in the remote index
 * @throws InvalidPackageError when the source has no package.yml or the build
 *   reports a different name or version than the manifest
 */
export async function stagePackage(
  source: string,
  stagingRoot: string,
  forge: boolean,
  ctx: ExecutionContext
): Promise<StagedPackage> {
  const { fetcher, toolchain } = ctx.collaborators;

  const locator = await resolveLocator(source, forge, ctx);
  const stagedPath = await fetcher.fetch(locator, stagingRoot);

  if (!(await exists(getManifestPath(stagedPath)))) {
    throw new InvalidPackageError(`${source} does not contain a package.yml`);
  }

  const build = await toolchain.build(stagedPath);
  const manifest = await readPackageManifest(build.packageRoot);
  if (manifest.name !== build.name || manifest.version !== build.version) {
    throw new InvalidPackageError(
      `${source}: build produced ${build.name} ${build.version} but package.yml declares ${manifest.name} ${manifest.version}`
    );
  }

  return { source, manifest, build };
}
