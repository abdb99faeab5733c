import type { EffectiveSet } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { SafetyVerdict } from './types.js';

/**
 * Names among `candidates` (other than target) whose record declares a dependency on `target`
 */
function findDependents(target: string, installed: EffectiveSet, candidates: Iterable<string>): string[] {
  const dependents = new Set<string>();
  for (const name of candidates) {
    if (name === target) continue;
    const record = installed.get(name);
    if (record?.dependencies.some(dep => dep.name === target)) {
      dependents.add(name);
    }
  }
  return Array.from(dependents).sort();
}

function toVerdict(action: string, target: string, dependents: string[], allowMissing: boolean): SafetyVerdict {
  if (dependents.length === 0) {
    return { kind: 'ok', overridden: [] };
  }
  if (allowMissing) {
    logger.warn(`${action} ${target} although ${dependents.join(', ')} depend on it`);
    return { kind: 'ok', overridden: dependents };
  }
  return { kind: 'blocked', blockedBy: dependents };
}

/**
 * Unloading is blocked by every other loaded package that depends on `target`.
 */
export function resolveUnloadSafety(
  target: string,
  installed: EffectiveSet,
  loaded: ReadonlySet<string>,
  allowMissing: boolean = false
): SafetyVerdict {
  return toVerdict('Unloading', target, findDependents(target, installed, loaded), allowMissing);
}

/**
 * Uninstalling is blocked by every other installed package that depends on
 * `target`, loaded or not.
 */
export function resolveUninstallSafety(
  target: string,
  installed: EffectiveSet,
  allowMissing: boolean = false
): SafetyVerdict {
  return toVerdict('Uninstalling', target, findDependents(target, installed, installed.keys()), allowMissing);
}
