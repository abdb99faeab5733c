import type { PackageRecord, RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { effectiveSetOf, loadRegistries } from '../registry/registry-store.js';
import { getLoadedNames } from '../load/load-manager.js';
import { PackageNotFoundError } from '../../utils/errors.js';

export interface ListPackageReport {
  record: PackageRecord;
  scope: RegistryScope;
  loaded: boolean;
}

/**
 * Installed packages as the environment sees them (local shadows global),
 * sorted by name. With `names`, only those packages are reported.
 *
 * @throws PackageNotFoundError listing every requested name that is not installed
 */
export async function runListPipeline(names: string[] | undefined, ctx: ExecutionContext): Promise<ListPackageReport[]> {
  const registries = await loadRegistries(ctx.registryPaths);
  const installed = effectiveSetOf(registries);

  let selected = Array.from(installed.values());
  if (names && names.length > 0) {
    const missing = names.filter(name => !installed.has(name));
    if (missing.length > 0) {
      throw new PackageNotFoundError(missing);
    }
    const wanted = new Set(names);
    selected = selected.filter(record => wanted.has(record.name));
  }

  const loaded = await getLoadedNames(installed, ctx.collaborators.activator);

  return selected
    .sort((a, b) => a.name.localeCompare(b.name))
    .map(record => ({
      record,
      scope: registries.local.records.has(record.name) ? 'local' : 'global',
      loaded: loaded.has(record.name)
    }));
}

/**
 * Package names the remote index offers
 */
export async function runRemoteListPipeline(ctx: ExecutionContext): Promise<string[]> {
  return await ctx.collaborators.index.listPackages();
}
