import type { ConstraintOperator, DependencySpec } from '../types/index.js';
import { ValidationError } from './errors.js';
import { compareVersions, isValidVersion } from './version.js';
import { isMapping } from './validation/mapping.js';

// name, "name >= 1.2", "name (>= 1.2)"
const DEPENDENCY_PATTERN = /^([A-Za-z0-9_.+-]+?)\s*(?:\(?\s*(>=|<=|==|!=|=|>|<)\s*([^\s()]+)\s*\)?)?$/;

const OPERATORS: readonly ConstraintOperator[] = ['>=', '<=', '>', '<', '==', '!='];

function normalizeOperator(raw: string): ConstraintOperator {
  if (raw === '=') return '==';
  const match = OPERATORS.find(op => op === raw);
  if (!match) {
    throw new ValidationError(`unknown version operator '${raw}'`);
  }
  return match;
}

/**
 * Parse the textual form of a dependency declaration
 */
export function parseDependencySpec(text: string): DependencySpec {
  const match = DEPENDENCY_PATTERN.exec(text.trim());
  if (!match || !match[1]) {
    throw new ValidationError(`malformed dependency '${text}'`);
  }

  const [, name, rawOperator, version] = match;
  if (!rawOperator || !version) {
    return { name };
  }

  if (!isValidVersion(version)) {
    throw new ValidationError(`dependency '${text}' has invalid version '${version}'`);
  }

  return { name, operator: normalizeOperator(rawOperator), version };
}

/**
 * Accepts either the textual form or a `{ name, operator, version }` mapping
 */
export function parseDependencyEntry(entry: unknown): DependencySpec {
  if (typeof entry === 'string') {
    return parseDependencySpec(entry);
  }

  if (!isMapping(entry)) {
    throw new ValidationError(`dependency entries must be strings or mappings, got ${JSON.stringify(entry)}`);
  }

  const { name, operator, version } = entry;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('dependency mapping is missing a name');
  }
  if (operator === undefined && version === undefined) {
    return { name: name.trim() };
  }
  if (typeof version !== 'string' || !isValidVersion(version)) {
    throw new ValidationError(`dependency '${name}' has invalid version ${JSON.stringify(version)}`);
  }

  return {
    name: name.trim(),
    operator: normalizeOperator(typeof operator === 'string' ? operator : '>='),
    version
  };
}

export function formatDependencySpec(spec: DependencySpec): string {
  return spec.operator && spec.version ? `${spec.name} ${spec.operator} ${spec.version}` : spec.name;
}

export function satisfiesDependency(installedVersion: string, spec: DependencySpec): boolean {
  if (!spec.operator || !spec.version) {
    return true;
  }

  const order = compareVersions(installedVersion, spec.version);
  switch (spec.operator) {
    case '>=':
      return order !== 'LESS';
    case '<=':
      return order !== 'GREATER';
    case '>':
      return order === 'GREATER';
    case '<':
      return order === 'LESS';
    case '==':
      return order === 'EQUAL';
    case '!=':
      return order !== 'EQUAL';
  }
}
