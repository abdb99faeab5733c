import * as yaml from 'js-yaml';
import type { Installer, PackageRecord, Registry, RegistryScope } from '../../types/index.js';
import { REGISTRY_HEADER_COMMENT } from '../../constants/index.js';
import { CorruptRegistryError, getErrorMessage } from '../../utils/errors.js';
import { formatDependencySpec, parseDependencyEntry } from '../../utils/dependency-spec.js';
import { isValidVersion } from '../../utils/version.js';
import { isMapping } from '../../utils/validation/mapping.js';

/**
 * On-disk form of a registry: a YAML mapping from package name to record.
 * `installer` is not stored; it follows from the registry a record lives in.
 */

const OPTIONAL_TEXT_FIELDS = ['description', 'author', 'maintainer', 'license', 'url'] as const;

export function installerForScope(scope: RegistryScope): Installer {
  return scope === 'global' ? 'system' : 'user';
}

function parseRecord(name: string, entry: unknown, registryPath: string, scope: RegistryScope): PackageRecord {
  if (!isMapping(entry)) {
    throw new CorruptRegistryError(registryPath, `entry '${name}' is not a mapping`);
  }

  const { version, directory, archDirectory, dependencies } = entry;
  if (typeof version !== 'string' || !isValidVersion(version)) {
    throw new CorruptRegistryError(registryPath, `entry '${name}' has invalid version ${JSON.stringify(version)}`);
  }
  if (typeof directory !== 'string' || directory.length === 0) {
    throw new CorruptRegistryError(registryPath, `entry '${name}' has no directory`);
  }
  if (archDirectory !== undefined && typeof archDirectory !== 'string') {
    throw new CorruptRegistryError(registryPath, `entry '${name}' has invalid archDirectory`);
  }
  if (dependencies !== undefined && !Array.isArray(dependencies)) {
    throw new CorruptRegistryError(registryPath, `entry '${name}' has invalid dependencies`);
  }

  const record: PackageRecord = {
    name,
    version,
    directory,
    archDirectory: archDirectory ?? '',
    dependencies: [],
    installer: installerForScope(scope)
  };

  try {
    record.dependencies = (dependencies ?? []).map(parseDependencyEntry);
  } catch (error) {
    throw new CorruptRegistryError(registryPath, `entry '${name}': ${getErrorMessage(error)}`);
  }

  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value = entry[field];
    if (typeof value === 'string' && value.length > 0) {
      record[field] = value;
    }
  }

  return record;
}

export function parseRegistryContent(content: string, registryPath: string, scope: RegistryScope): Registry {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new CorruptRegistryError(registryPath, `unparseable YAML (${getErrorMessage(error)})`);
  }

  const registry: Registry = { scope, path: registryPath, records: new Map() };

  // An empty file is an empty registry
  if (parsed === undefined || parsed === null) {
    return registry;
  }

  if (!isMapping(parsed)) {
    throw new CorruptRegistryError(registryPath, 'top level is not a mapping');
  }

  const packages = parsed.packages;
  if (packages === undefined) {
    return registry;
  }
  if (!isMapping(packages)) {
    throw new CorruptRegistryError(registryPath, "'packages' is not a mapping");
  }

  for (const [name, entry] of Object.entries(packages)) {
    registry.records.set(name, parseRecord(name, entry, registryPath, scope));
  }

  return registry;
}

export function serializeRegistry(registry: Registry): string {
  const packages: Record<string, Record<string, unknown>> = {};

  for (const record of registry.records.values()) {
    const entry: Record<string, unknown> = {
      version: record.version,
      directory: record.directory,
      archDirectory: record.archDirectory
    };
    if (record.dependencies.length > 0) {
      entry.dependencies = record.dependencies.map(formatDependencySpec);
    }
    for (const field of OPTIONAL_TEXT_FIELDS) {
      const value = record[field];
      if (value) entry[field] = value;
    }
    packages[record.name] = entry;
  }

  const body = yaml.dump({ packages }, { indent: 2, noArrayIndent: true, sortKeys: false, lineWidth: -1 });
  return `${REGISTRY_HEADER_COMMENT}\n${body}`;
}
