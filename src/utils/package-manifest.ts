import * as yaml from 'js-yaml';
import { join } from 'path';
import type { PackageManifest } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { readTextFile, writeTextFile } from './fs.js';
import { InvalidPackageError, getErrorMessage } from './errors.js';
import { isValidVersion } from './version.js';
import { formatDependencySpec, parseDependencyEntry } from './dependency-spec.js';
import { isMapping } from './validation/mapping.js';

const OPTIONAL_TEXT_FIELDS = ['description', 'author', 'maintainer', 'license', 'url'] as const;

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function getManifestPath(packageRoot: string): string {
  return join(packageRoot, FILE_PATTERNS.PACKAGE_YML);
}

/**
 * Parse package.yml content with validation
 */
export function parseManifestContent(content: string, source: string): PackageManifest {
  let parsed: unknown;
  try {
    // Every scalar stays a string so "1.10" is not read as the number 1.1
    parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new InvalidPackageError(`${source} is not valid YAML: ${getErrorMessage(error)}`, { source });
  }

  if (!isMapping(parsed)) {
    throw new InvalidPackageError(`${source} must be a mapping`, { source });
  }

  const data = parsed;
  const name = data.name;
  if (typeof name !== 'string' || !NAME_PATTERN.test(name)) {
    throw new InvalidPackageError(`${source} must contain a valid name field`, { source });
  }

  const version = data.version;
  if (typeof version !== 'string' || !isValidVersion(version)) {
    throw new InvalidPackageError(`${source}: '${name}' has an invalid version ${JSON.stringify(data.version)}`, { source });
  }

  const rawDepends = data.depends ?? [];
  if (!Array.isArray(rawDepends)) {
    throw new InvalidPackageError(`${source}: depends must be a list`, { source });
  }

  const manifest: PackageManifest = { name, version, depends: [] };
  try {
    manifest.depends = rawDepends.map(parseDependencyEntry);
  } catch (error) {
    throw new InvalidPackageError(`${source}: ${getErrorMessage(error)}`, { source });
  }

  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value = data[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      manifest[field] = value.trim();
    }
  }

  return manifest;
}

export async function readPackageManifest(packageRoot: string): Promise<PackageManifest> {
  const manifestPath = getManifestPath(packageRoot);
  const content = await readTextFile(manifestPath);
  return parseManifestContent(content, manifestPath);
}

export function serializePackageManifest(manifest: PackageManifest): string {
  const { depends, ...rest } = manifest;
  return yaml.dump(
    {
      ...rest,
      ...(depends.length > 0 ? { depends: depends.map(formatDependencySpec) } : {})
    },
    { indent: 2, noArrayIndent: true, sortKeys: false, quotingType: '"' }
  );
}

export async function writePackageManifest(packageRoot: string, manifest: PackageManifest): Promise<void> {
  await writeTextFile(getManifestPath(packageRoot), serializePackageManifest(manifest));
}
