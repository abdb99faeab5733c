/**
 * Registry Store
 *
 * Loads, queries, mutates and persists the two package registries. The
 * in-memory Registry objects are the source of truth while a command runs;
 * nothing reaches disk except through persistRegistry.
 */

import type { EffectiveSet, PackageRecord, Registry, RegistryScope } from '../../types/index.js';
import type { RegistryPaths } from '../../types/execution-context.js';
import { exists, readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { installerForScope, parseRegistryContent, serializeRegistry } from './registry-yml.js';

export interface Registries {
  local: Registry;
  global: Registry;
}

export function createRegistry(scope: RegistryScope, path: string): Registry {
  return { scope, path, records: new Map() };
}

/**
 * Read a registry file. A missing file is an empty registry; an unreadable
 * one raises CorruptRegistryError.
 */
export async function loadRegistry(path: string, scope: RegistryScope): Promise<Registry> {
  if (!(await exists(path))) {
    logger.debug(`No ${scope} registry at ${path}, starting empty`);
    return createRegistry(scope, path);
  }

  const content = await readTextFile(path);
  const registry = parseRegistryContent(content, path, scope);
  logger.debug(`Loaded ${scope} registry from ${path}`, { packages: registry.records.size });
  return registry;
}

export async function loadRegistries(paths: RegistryPaths): Promise<Registries> {
  const local = await loadRegistry(paths.local, 'local');
  const global = await loadRegistry(paths.global, 'global');
  return { local, global };
}

/**
 * Write the whole registry; readers never observe a partially written file.
 */
export async function persistRegistry(registry: Registry): Promise<void> {
  await writeTextFileAtomic(registry.path, serializeRegistry(registry));
  logger.debug(`Persisted ${registry.scope} registry to ${registry.path}`, { packages: registry.records.size });
}

/**
 * Local records shadow global records of the same name.
 */
export function effectiveSet(local: Registry, global: Registry): Map<string, PackageRecord> {
  const merged = new Map<string, PackageRecord>(local.records);
  for (const [name, record] of global.records) {
    if (!merged.has(name)) {
      merged.set(name, record);
    }
  }
  return merged;
}

export function effectiveSetOf(registries: Registries): Map<string, PackageRecord> {
  return effectiveSet(registries.local, registries.global);
}

export function findByName(registry: Registry, name: string): PackageRecord | undefined {
  return registry.records.get(name);
}

export function selectRegistry(registries: Registries, scope: RegistryScope): Registry {
  return scope === 'global' ? registries.global : registries.local;
}

/**
 * Insert or replace a record. The record's installer follows the registry.
 */
export function upsertRecord(registry: Registry, record: PackageRecord): PackageRecord {
  const stored: PackageRecord = { ...record, installer: installerForScope(registry.scope) };
  registry.records.set(stored.name, stored);
  return stored;
}

export function removeRecord(registry: Registry, name: string): PackageRecord | undefined {
  const existing = registry.records.get(name);
  registry.records.delete(name);
  return existing;
}

/**
 * Effective set with some names taken out, as it would look after they are gone
 */
export function withoutNames(set: EffectiveSet, names: Iterable<string>): Map<string, PackageRecord> {
  const excluded = new Set(names);
  return new Map(Array.from(set).filter(([name]) => !excluded.has(name)));
}
