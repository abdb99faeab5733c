/**
 * Install Orchestrator
 *
 * Turns a list of package sources into installed, registered packages:
 *
 *   stage (fetch + build) -> order -> per package: check deps, copy, register
 *
 * Work is best effort per package. A package that fails to fetch, build,
 * satisfy its dependencies or copy is reported in `failures`; packages
 * installed before it stay installed. A replaced version keeps its files,
 * record and load state until the new version is copied and registered.
 */

import { basename, join } from 'path';

import type { PackageRecord, Registry, RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { PACKAGE_PATHS } from '../../constants/index.js';
import { getPackageInstallDirectories } from '../directory.js';
import {
  effectiveSetOf,
  findByName,
  loadRegistries,
  persistRegistry,
  removeRecord,
  selectRegistry,
  upsertRecord,
  type Registries
} from '../registry/registry-store.js';
import { findUnsatisfiedDependencies, resolveInstallOrder } from '../dependency-resolver/index.js';
import { resolveOutput } from '../ports/resolve.js';
import { copyDirectory, copyFile, ensureDir, isDirectory, remove } from '../../utils/fs.js';
import { UnsatisfiedDependencyError, ValidationError, getErrorMessage } from '../../utils/errors.js';
import { writePackageManifest } from '../../utils/package-manifest.js';
import { logger } from '../../utils/logger.js';
import { stagePackage, withStagingDirectory, type StagedPackage } from './staging.js';

export interface InstallOptions {
  /** Install even when declared dependencies are not satisfied */
  noDeps?: boolean;
  preferLocal?: boolean;
  preferGlobal?: boolean;
  /** Sources are package names resolved through the remote index */
  forge?: boolean;
}

export interface InstalledPackage {
  record: PackageRecord;
  scope: RegistryScope;
  /** Version that was replaced in the same registry */
  previousVersion?: string;
}

export interface SkippedPackage {
  name: string;
  version: string;
  reason: string;
}

export interface InstallFailure {
  /** Source as given on the command line */
  source: string;
  /** Package name, once the source has been staged */
  name?: string;
  error: Error;
}

export interface InstallResult {
  scope: RegistryScope;
  installed: InstalledPackage[];
  skipped: SkippedPackage[];
  failures: InstallFailure[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Registry an install writes to
 */
export function resolveTargetScope(
  options: Pick<InstallOptions, 'preferLocal' | 'preferGlobal'>,
  privileged: boolean
): RegistryScope {
  if (options.preferLocal && options.preferGlobal) {
    throw new ValidationError('Options --local and --global are mutually exclusive');
  }
  if (options.preferGlobal) return 'global';
  if (options.preferLocal) return 'local';
  return privileged ? 'global' : 'local';
}

async function copyStagedFiles(staged: StagedPackage, directory: string, archDirectory: string): Promise<void> {
  const { build, manifest } = staged;
  const instDir = join(build.packageRoot, PACKAGE_PATHS.INST);
  if (await isDirectory(instDir)) {
    await copyDirectory(instDir, directory);
  } else {
    await ensureDir(directory);
  }
  await writePackageManifest(directory, manifest);

  if (build.archFiles.length > 0) {
    await ensureDir(archDirectory);
    for (const file of build.archFiles) {
      await copyFile(file, join(archDirectory, basename(file)));
    }
  }
}

function installPrefixes(scope: RegistryScope, ctx: ExecutionContext): { prefix: string; archPrefix: string } {
  const paths = ctx.installPaths;
  return scope === 'global'
    ? { prefix: paths.globalPrefix, archPrefix: paths.globalArchPrefix }
    : { prefix: paths.prefix, archPrefix: paths.archPrefix };
}

async function installStaged(
  staged: StagedPackage,
  registries: Registries,
  target: Registry,
  options: InstallOptions,
  ctx: ExecutionContext
): Promise<InstalledPackage> {
  const { manifest } = staged;
  const output = resolveOutput(ctx);

  const unsatisfied = findUnsatisfiedDependencies(
    { name: manifest.name, version: manifest.version, dependencies: manifest.depends },
    effectiveSetOf(registries)
  );
  if (unsatisfied.length > 0) {
    if (!options.noDeps) {
      throw new UnsatisfiedDependencyError(unsatisfied);
    }
    for (const requirement of unsatisfied) {
      output.warn(`${manifest.name}: installing without ${requirement.requirement}`);
    }
  }

  const { prefix, archPrefix } = installPrefixes(target.scope, ctx);
  const { directory, archDirectory } = getPackageInstallDirectories(manifest.name, manifest.version, prefix, archPrefix);

  const previous = findByName(target, manifest.name);
  const { activator } = ctx.collaborators;
  const wasLoaded = previous ? (await activator.activeDirectories()).includes(previous.directory) : false;
  const newDirectories = [directory, archDirectory];

  let record: PackageRecord;
  try {
    await copyStagedFiles(staged, directory, archDirectory);
    record = upsertRecord(target, {
      name: manifest.name,
      version: manifest.version,
      directory,
      archDirectory: staged.build.archFiles.length > 0 ? archDirectory : '',
      dependencies: manifest.depends,
      installer: 'user',
      ...(manifest.description ? { description: manifest.description } : {}),
      ...(manifest.author ? { author: manifest.author } : {}),
      ...(manifest.maintainer ? { maintainer: manifest.maintainer } : {}),
      ...(manifest.license ? { license: manifest.license } : {}),
      ...(manifest.url ? { url: manifest.url } : {})
    });
    await persistRegistry(target);
  } catch (error) {
    if (previous) {
      upsertRecord(target, previous);
    } else {
      removeRecord(target, manifest.name);
    }
    for (const dir of newDirectories) {
      await remove(dir);
    }
    throw error;
  }

  if (previous) {
    if (wasLoaded) {
      await activator.deactivate(previous.directory, previous.archDirectory);
    }
    logger.debug(`Removing previous install of ${previous.name} ${previous.version}`);
    for (const dir of [previous.directory, previous.archDirectory]) {
      if (dir && !newDirectories.includes(dir)) await remove(dir);
    }
  }

  if (wasLoaded) {
    await activator.activate(record.directory, record.archDirectory);
  }

  return {
    record,
    scope: target.scope,
    ...(previous ? { previousVersion: previous.version } : {})
  };
}

/**
 * Install packages from archives, directories, URLs or (with `forge`) the
 * remote package index.
 *
 * @throws ValidationError when --local and --global are both given
 * @throws UnresolvableRequestError when requested packages depend on each other in a cycle
 * @throws CorruptRegistryError when a registry file cannot be read
 */
export async function installPackages(
  sources: string[],
  options: InstallOptions,
  ctx: ExecutionContext
): Promise<InstallResult> {
  if (sources.length === 0) {
    throw new ValidationError('No packages given to install');
  }

  const scope = resolveTargetScope(options, ctx.privileged);
  const registries = await loadRegistries(ctx.registryPaths);
  const target = selectRegistry(registries, scope);
  const output = resolveOutput(ctx);

  const result: InstallResult = { scope, installed: [], skipped: [], failures: [] };

  await withStagingDirectory(ctx.stagingDirectory, 'install', async stagingRoot => {
    const staged = new Map<string, StagedPackage>();

    for (const source of sources) {
      const spinner = output.spinner();
      spinner.start(`Preparing ${source}`);
      try {
        const pkg = await stagePackage(source, stagingRoot, options.forge ?? false, ctx);
        if (staged.has(pkg.manifest.name)) {
          throw new ValidationError(`Package '${pkg.manifest.name}' is requested more than once`);
        }
        staged.set(pkg.manifest.name, pkg);
        spinner.stop(`Prepared ${pkg.manifest.name} ${pkg.manifest.version}`);
      } catch (error) {
        spinner.stop(`Failed to prepare ${source}`);
        logger.debug(`Staging ${source} failed`, { error });
        result.failures.push({ source, error: toError(error) });
      }
    }

    const candidates = Array.from(staged.values()).map(pkg => ({
      name: pkg.manifest.name,
      version: pkg.manifest.version,
      dependencies: pkg.manifest.depends
    }));
    // Only the target registry's own copy makes a candidate redundant
    const order = resolveInstallOrder(candidates, target.records);

    const ordered = new Set(order);
    for (const candidate of candidates) {
      if (!ordered.has(candidate.name)) {
        result.skipped.push({ name: candidate.name, version: candidate.version, reason: 'already installed' });
      }
    }

    for (const name of order) {
      const pkg = staged.get(name);
      if (!pkg) continue;
      try {
        result.installed.push(await installStaged(pkg, registries, target, options, ctx));
        logger.info(`Installed ${name} ${pkg.manifest.version} into the ${scope} registry`);
      } catch (error) {
        logger.debug(`Installing ${name} failed`, { error });
        result.failures.push({ source: pkg.source, name, error: toError(error) });
      }
    }
  });

  return result;
}
