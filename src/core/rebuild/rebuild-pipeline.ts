/**
 * Rebuild Pipeline
 *
 * Regenerates a registry file from the package directories found under the
 * scope's install prefix. Every installed directory carries the package's
 * package.yml, which is all a record needs.
 */

import { join } from 'path';

import type { PackageManifest, PackageRecord, Registry, RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { createRegistry, persistRegistry, upsertRecord } from '../registry/registry-store.js';
import { resolveInstallOrder } from '../dependency-resolver/index.js';
import { getPackageDirName } from '../directory.js';
import { resolveOutput } from '../ports/resolve.js';
import { exists, isDirectory, listDirectories } from '../../utils/fs.js';
import { CyclicDependencyError, getErrorMessage } from '../../utils/errors.js';
import { getManifestPath, readPackageManifest } from '../../utils/package-manifest.js';
import { compareVersions } from '../../utils/version.js';
import { logger } from '../../utils/logger.js';

export interface RebuildResult {
  registry: Registry;
  /** Directories that could not be read as packages */
  warnings: string[];
}

interface ScannedPackage {
  manifest: PackageManifest;
  directory: string;
  archDirectory: string;
}

function recordFromScan(scanned: ScannedPackage): PackageRecord {
  const { manifest } = scanned;
  return {
    name: manifest.name,
    version: manifest.version,
    directory: scanned.directory,
    archDirectory: scanned.archDirectory,
    dependencies: manifest.depends,
    installer: 'user',
    ...(manifest.description ? { description: manifest.description } : {}),
    ...(manifest.author ? { author: manifest.author } : {}),
    ...(manifest.maintainer ? { maintainer: manifest.maintainer } : {}),
    ...(manifest.license ? { license: manifest.license } : {}),
    ...(manifest.url ? { url: manifest.url } : {})
  };
}

async function scanPrefix(prefix: string, archPrefix: string, warnings: string[]): Promise<Map<string, ScannedPackage>> {
  const found = new Map<string, ScannedPackage>();
  if (!(await isDirectory(prefix))) {
    return found;
  }

  for (const dirName of await listDirectories(prefix)) {
    const directory = join(prefix, dirName);
    if (!(await exists(getManifestPath(directory)))) {
      logger.debug(`Skipping ${directory}: no package.yml`);
      continue;
    }

    let manifest: PackageManifest;
    try {
      manifest = await readPackageManifest(directory);
    } catch (error) {
      warnings.push(`Skipping ${directory}: ${getErrorMessage(error)}`);
      continue;
    }

    const archCandidate = join(archPrefix, getPackageDirName(manifest.name, manifest.version));
    const archDirectory = (await isDirectory(archCandidate)) ? archCandidate : '';
    const scanned: ScannedPackage = { manifest, directory, archDirectory };

    const existing = found.get(manifest.name);
    if (existing) {
      const keepNew = compareVersions(manifest.version, existing.manifest.version) === 'GREATER';
      const kept = keepNew ? scanned : existing;
      const dropped = keepNew ? existing : scanned;
      warnings.push(`Found ${manifest.name} twice; keeping ${kept.manifest.version} at ${kept.directory}, ignoring ${dropped.directory}`);
      if (keepNew) found.set(manifest.name, scanned);
      continue;
    }
    found.set(manifest.name, scanned);
  }

  return found;
}

/**
 * Dependencies first; name order when the scanned packages form a cycle
 */
function orderScanned(scanned: Map<string, ScannedPackage>, warnings: string[]): string[] {
  const candidates = Array.from(scanned.values())
    .map(({ manifest }) => ({ name: manifest.name, version: manifest.version, dependencies: manifest.depends }))
    .sort((a, b) => a.name.localeCompare(b.name));
  const byName = candidates.map(candidate => candidate.name);
  try {
    return resolveInstallOrder(candidates, new Map());
  } catch (error) {
    if (!(error instanceof CyclicDependencyError)) throw error;
    warnings.push(`${error.message}; writing packages in name order`);
    return byName;
  }
}

/**
 * Rebuild the registry of `scope` from disk and persist it. When `names`
 * is given only those packages are kept.
 */
export async function rebuildRegistry(
  scope: RegistryScope,
  names: string[] | undefined,
  ctx: ExecutionContext
): Promise<RebuildResult> {
  const output = resolveOutput(ctx);
  const warnings: string[] = [];
  const paths = ctx.installPaths;
  const prefix = scope === 'global' ? paths.globalPrefix : paths.prefix;
  const archPrefix = scope === 'global' ? paths.globalArchPrefix : paths.archPrefix;

  const scanned = await scanPrefix(prefix, archPrefix, warnings);
  let order = orderScanned(scanned, warnings);

  if (names && names.length > 0) {
    const wanted = new Set(names);
    for (const name of wanted) {
      if (!scanned.has(name)) warnings.push(`Package '${name}' was not found under ${prefix}`);
    }
    order = order.filter(name => wanted.has(name));
  }

  const registry = createRegistry(scope, scope === 'global' ? ctx.registryPaths.global : ctx.registryPaths.local);
  for (const name of order) {
    const entry = scanned.get(name);
    if (entry) upsertRecord(registry, recordFromScan(entry));
  }

  await persistRegistry(registry);
  for (const warning of warnings) {
    output.warn(warning);
  }
  logger.info(`Rebuilt ${scope} registry with ${registry.records.size} packages`);

  return { registry, warnings };
}
