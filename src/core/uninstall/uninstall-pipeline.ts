import type { PackageRecord, RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import {
  effectiveSet,
  effectiveSetOf,
  findByName,
  loadRegistries,
  persistRegistry,
  removeRecord,
  selectRegistry,
  withoutNames
} from '../registry/registry-store.js';
import { resolveUninstallSafety } from '../dependency-resolver/index.js';
import { BlockedByError, PackageNotFoundError, ValidationError } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface UninstallOptions {
  /** Remove packages even when other installed packages depend on them */
  noDeps?: boolean;
  preferGlobal?: boolean;
}

export interface UninstallPipelineResult {
  scope: RegistryScope;
  removed: PackageRecord[];
  /** Dependents left with a missing dependency because of --nodeps */
  overridden: string[];
}

function uniqueNames(names: string[]): string[] {
  return Array.from(new Set(names));
}

/**
 * Uninstall packages from one registry.
 *
 * The whole request is checked before anything is removed: a package stays
 * removable when its only dependents are part of the same request, or when a
 * copy of the same name remains installed in the other registry.
 *
 * @throws PackageNotFoundError listing every name missing from the registry
 * @throws BlockedByError listing every installed dependent that blocks the request
 */
export async function runUninstallPipeline(
  packageNames: string[],
  options: UninstallOptions,
  ctx: ExecutionContext
): Promise<UninstallPipelineResult> {
  const names = uniqueNames(packageNames);
  if (names.length === 0) {
    throw new ValidationError('No packages given to uninstall');
  }

  const scope: RegistryScope = options.preferGlobal ? 'global' : 'local';
  const otherScope: RegistryScope = scope === 'global' ? 'local' : 'global';
  const registries = await loadRegistries(ctx.registryPaths);
  const registry = selectRegistry(registries, scope);
  const other = selectRegistry(registries, otherScope);

  const missing = names.filter(name => !findByName(registry, name));
  if (missing.length > 0) {
    const elsewhere = missing.filter(name => findByName(other, name));
    const hint = elsewhere.length > 0
      ? `${elsewhere.join(', ')} ${elsewhere.length === 1 ? 'is' : 'are'} installed in the ${otherScope} registry; use ${otherScope === 'global' ? '--global' : '--local'}`
      : undefined;
    throw new PackageNotFoundError(missing, { location: `installed in the ${scope} registry`, ...(hint ? { hint } : {}) });
  }

  const installed = effectiveSetOf(registries);
  const remainingRegistry = { ...registry, records: new Map(registry.records) };
  for (const name of names) {
    remainingRegistry.records.delete(name);
  }
  const after = scope === 'global'
    ? effectiveSet(registries.local, remainingRegistry)
    : effectiveSet(remainingRegistry, registries.global);

  const blockedTargets: string[] = [];
  const blockers = new Set<string>();
  const overridden = new Set<string>();

  for (const name of names) {
    const shadowed = after.get(name);
    if (shadowed) {
      logger.debug(`${name} ${shadowed.version} stays installed in the ${otherScope} registry`);
      continue;
    }
    const others = names.filter(n => n !== name);
    const verdict = resolveUninstallSafety(name, withoutNames(installed, others), options.noDeps ?? false);
    if (verdict.kind === 'blocked') {
      blockedTargets.push(name);
      verdict.blockedBy.forEach(dependent => blockers.add(dependent));
    } else {
      verdict.overridden.forEach(dependent => overridden.add(dependent));
    }
  }

  if (blockedTargets.length > 0) {
    throw new BlockedByError('uninstall', blockedTargets, Array.from(blockers).sort());
  }

  const { activator } = ctx.collaborators;
  const active = new Set(await activator.activeDirectories());
  const removed: PackageRecord[] = [];

  for (const name of names) {
    const record = findByName(registry, name);
    if (!record) continue;

    if (active.has(record.directory)) {
      await activator.deactivate(record.directory, record.archDirectory);
    }
    await remove(record.directory);
    if (record.archDirectory) {
      await remove(record.archDirectory);
    }
    removeRecord(registry, name);
    await persistRegistry(registry);
    removed.push(record);
    logger.info(`Uninstalled ${record.name} ${record.version} from the ${scope} registry`);
  }

  return { scope, removed, overridden: Array.from(overridden).sort() };
}
