import { relative } from 'path';

import type { RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { effectiveSetOf, loadRegistries } from '../registry/registry-store.js';
import { getLoadedNames } from '../load/load-manager.js';
import { PackageNotFoundError } from '../../utils/errors.js';
import { formatDependencySpec } from '../../utils/dependency-spec.js';
import { isDirectory, walkFiles } from '../../utils/fs.js';
import { FILE_PATTERNS } from '../../constants/index.js';

export type PackageStatus = 'Loaded' | 'Not loaded';

export interface PackageDescription {
  name: string;
  version: string;
  scope: RegistryScope;
  status: PackageStatus;
  description?: string;
  author?: string;
  maintainer?: string;
  license?: string;
  url?: string;
  dependencies: string[];
  /** Files relative to the package directory; only with verbose */
  providedFiles?: string[];
  /** Compiled files relative to the arch directory; only with verbose */
  archFiles?: string[];
}

export interface DescribeOptions {
  verbose?: boolean;
}

async function listPackageFiles(root: string): Promise<string[]> {
  if (!root || !(await isDirectory(root))) return [];
  const files: string[] = [];
  for await (const file of walkFiles(root)) {
    const rel = relative(root, file);
    if (rel !== FILE_PATTERNS.PACKAGE_YML) files.push(rel);
  }
  return files;
}

/**
 * Describe installed packages (all of them when `names` is empty).
 *
 * @throws PackageNotFoundError listing every requested name that is not installed
 */
export async function runDescribePipeline(
  names: string[] | undefined,
  options: DescribeOptions,
  ctx: ExecutionContext
): Promise<PackageDescription[]> {
  const registries = await loadRegistries(ctx.registryPaths);
  const installed = effectiveSetOf(registries);

  const requested = names && names.length > 0 ? names : Array.from(installed.keys()).sort();
  const missing = requested.filter(name => !installed.has(name));
  if (missing.length > 0) {
    throw new PackageNotFoundError(missing);
  }

  const loaded = await getLoadedNames(installed, ctx.collaborators.activator);
  const descriptions: PackageDescription[] = [];

  for (const name of requested) {
    const record = installed.get(name);
    if (!record) continue;
    descriptions.push({
      name: record.name,
      version: record.version,
      scope: registries.local.records.has(name) ? 'local' : 'global',
      status: loaded.has(name) ? 'Loaded' : 'Not loaded',
      ...(record.description ? { description: record.description } : {}),
      ...(record.author ? { author: record.author } : {}),
      ...(record.maintainer ? { maintainer: record.maintainer } : {}),
      ...(record.license ? { license: record.license } : {}),
      ...(record.url ? { url: record.url } : {}),
      dependencies: record.dependencies.map(formatDependencySpec),
      ...(options.verbose
        ? { providedFiles: await listPackageFiles(record.directory), archFiles: await listPackageFiles(record.archDirectory) }
        : {})
    });
  }

  return descriptions;
}
