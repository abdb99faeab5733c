/**
 * Update Checker
 *
 * Compares installed versions with the latest versions the remote index
 * knows and reinstalls the packages that are behind.
 */

import type { RegistryScope } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { findByName, loadRegistries } from '../registry/registry-store.js';
import { installPackages, type InstallOptions, type InstallResult } from '../install/install-orchestrator.js';
import { compareVersions } from '../../utils/version.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface UpdateCandidate {
  name: string;
  installedVersion: string;
  latestVersion: string;
  scope: RegistryScope;
}

export interface UpdateCheckResult {
  updates: UpdateCandidate[];
  upToDate: string[];
  warnings: string[];
}

export interface UpdateRunResult extends UpdateCheckResult {
  installs: InstallResult[];
}

/**
 * Ask the index for the latest version of every installed package (or of
 * the named ones). Unknown names and failed lookups become warnings.
 */
export async function checkForUpdates(names: string[] | undefined, ctx: ExecutionContext): Promise<UpdateCheckResult> {
  const registries = await loadRegistries(ctx.registryPaths);
  const result: UpdateCheckResult = { updates: [], upToDate: [], warnings: [] };

  const installed: Array<{ name: string; version: string; scope: RegistryScope }> = [];
  for (const registry of [registries.local, registries.global]) {
    for (const record of registry.records.values()) {
      installed.push({ name: record.name, version: record.version, scope: registry.scope });
    }
  }

  let selected = installed;
  if (names && names.length > 0) {
    const wanted = new Set(names);
    selected = installed.filter(entry => wanted.has(entry.name));
    for (const name of wanted) {
      if (!findByName(registries.local, name) && !findByName(registries.global, name)) {
        result.warnings.push(`Package '${name}' is not installed`);
      }
    }
  }

  // null marks a failed lookup so it is reported once
  const latestByName = new Map<string, string | null>();
  for (const entry of selected) {
    if (!latestByName.has(entry.name)) {
      try {
        latestByName.set(entry.name, await ctx.collaborators.index.latestVersion(entry.name));
      } catch (error) {
        logger.debug(`Version lookup for ${entry.name} failed`, { error });
        result.warnings.push(`Could not check ${entry.name}: ${getErrorMessage(error)}`);
        latestByName.set(entry.name, null);
      }
    }
    const latest = latestByName.get(entry.name);
    if (!latest) continue;

    if (compareVersions(latest, entry.version) === 'GREATER') {
      result.updates.push({ name: entry.name, installedVersion: entry.version, latestVersion: latest, scope: entry.scope });
    } else {
      result.upToDate.push(entry.name);
    }
  }

  return result;
}

/**
 * Check for updates and reinstall every outdated package from the index,
 * each into the registry that owned it.
 */
export async function runUpdate(
  names: string[] | undefined,
  options: Pick<InstallOptions, 'noDeps'>,
  ctx: ExecutionContext
): Promise<UpdateRunResult> {
  const check = await checkForUpdates(names, ctx);
  const installs: InstallResult[] = [];

  for (const scope of ['local', 'global'] as const) {
    const queued = check.updates.filter(update => update.scope === scope).map(update => update.name);
    if (queued.length === 0) continue;
    installs.push(await installPackages(queued, {
      forge: true,
      noDeps: options.noDeps ?? false,
      preferLocal: scope === 'local',
      preferGlobal: scope === 'global'
    }, ctx));
  }

  return { ...check, installs };
}
