/**
 * Load Manager
 *
 * Activates installed packages on the environment's search path and takes
 * them off again. A package counts as loaded while its directory is active.
 */

import type { EffectiveSet, PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { PathActivator } from '../ports/collaborators.js';
import { effectiveSetOf, loadRegistries } from '../registry/registry-store.js';
import { resolveLoadOrder, resolveUnloadSafety } from '../dependency-resolver/index.js';
import { resolveOutput } from '../ports/resolve.js';
import { BlockedByError, PackageNotFoundError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface LoadOptions {
  /** Skip unsatisfied dependencies and ignore loaded dependents (--nodeps) */
  allowMissing?: boolean;
}

export interface LoadResult {
  /** Packages activated by this call, in activation order */
  activated: PackageRecord[];
  /** Packages of the load order that were already active */
  alreadyLoaded: string[];
}

export interface UnloadResult {
  deactivated: PackageRecord[];
  notLoaded: string[];
  /** Loaded dependents left behind because of --nodeps */
  overridden: string[];
}

/**
 * Names of the installed packages whose directory is currently active
 */
export async function getLoadedNames(installed: EffectiveSet, activator: PathActivator): Promise<Set<string>> {
  const active = new Set(await activator.activeDirectories());
  const loaded = new Set<string>();
  for (const record of installed.values()) {
    if (active.has(record.directory)) {
      loaded.add(record.name);
    }
  }
  return loaded;
}

function requireNames(names: string[], action: string): string[] {
  const unique = Array.from(new Set(names));
  if (unique.length === 0) {
    throw new ValidationError(`No packages given to ${action}`);
  }
  return unique;
}

function requireInstalled(names: string[], installed: EffectiveSet): void {
  const missing = names.filter(name => !installed.has(name));
  if (missing.length > 0) {
    throw new PackageNotFoundError(missing);
  }
}

/**
 * Load packages together with everything they depend on. Every load order
 * is resolved before the first activation, so a failing request changes
 * nothing.
 *
 * @throws PackageNotFoundError listing every requested name that is not installed
 * @throws UnsatisfiedDependencyError unless allowMissing is set
 * @throws CyclicDependencyError
 */
export async function loadPackages(
  packageNames: string[],
  ctx: ExecutionContext,
  options: LoadOptions = {}
): Promise<LoadResult> {
  const names = requireNames(packageNames, 'load');
  const installed = effectiveSetOf(await loadRegistries(ctx.registryPaths));
  requireInstalled(names, installed);

  const output = resolveOutput(ctx);
  const sequence: PackageRecord[] = [];
  const queued = new Set<string>();
  for (const name of names) {
    const order = resolveLoadOrder(name, installed, {
      allowMissing: options.allowMissing ?? false,
      onWarning: message => output.warn(message)
    });
    for (const record of order) {
      if (queued.has(record.name)) continue;
      queued.add(record.name);
      sequence.push(record);
    }
  }

  const { activator } = ctx.collaborators;
  const loaded = await getLoadedNames(installed, activator);
  const result: LoadResult = { activated: [], alreadyLoaded: [] };

  for (const record of sequence) {
    if (loaded.has(record.name)) {
      result.alreadyLoaded.push(record.name);
      continue;
    }
    await activator.activate(record.directory, record.archDirectory);
    result.activated.push(record);
    logger.debug(`Loaded ${record.name} ${record.version}`);
  }

  return result;
}

/**
 * Unload the named packages only; their dependencies stay loaded. The
 * request is refused as a whole when a loaded package outside of it still
 * depends on one of the names.
 *
 * @throws PackageNotFoundError listing every requested name that is not installed
 * @throws BlockedByError listing every loaded dependent
 */
export async function unloadPackages(
  packageNames: string[],
  ctx: ExecutionContext,
  options: LoadOptions = {}
): Promise<UnloadResult> {
  const names = requireNames(packageNames, 'unload');
  const installed = effectiveSetOf(await loadRegistries(ctx.registryPaths));
  requireInstalled(names, installed);

  const { activator } = ctx.collaborators;
  const loaded = await getLoadedNames(installed, activator);
  const leaving = new Set(names);
  const staying = new Set(Array.from(loaded).filter(name => !leaving.has(name)));

  const blockedTargets: string[] = [];
  const blockers = new Set<string>();
  const overridden = new Set<string>();

  for (const name of names) {
    if (!loaded.has(name)) continue;
    const verdict = resolveUnloadSafety(name, installed, staying, options.allowMissing ?? false);
    if (verdict.kind === 'blocked') {
      blockedTargets.push(name);
      verdict.blockedBy.forEach(dependent => blockers.add(dependent));
    } else {
      verdict.overridden.forEach(dependent => overridden.add(dependent));
    }
  }

  if (blockedTargets.length > 0) {
    throw new BlockedByError('unload', blockedTargets, Array.from(blockers).sort());
  }

  const result: UnloadResult = { deactivated: [], notLoaded: [], overridden: Array.from(overridden).sort() };
  for (const name of names) {
    const record = installed.get(name);
    if (!record) continue;
    if (!loaded.has(name)) {
      result.notLoaded.push(name);
      continue;
    }
    await activator.deactivate(record.directory, record.archDirectory);
    result.deactivated.push(record);
    logger.debug(`Unloaded ${record.name} ${record.version}`);
  }

  return result;
}
