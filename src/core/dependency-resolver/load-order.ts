import type { DependencySpec, EffectiveSet, PackageRecord } from '../../types/index.js';
import {
  CyclicDependencyError,
  PackageNotFoundError,
  UnsatisfiedDependencyError,
  type UnsatisfiedRequirement
} from '../../utils/errors.js';
import { formatDependencySpec, satisfiesDependency } from '../../utils/dependency-spec.js';
import { logger } from '../../utils/logger.js';
import type { LoadOrderOptions, VisitState } from './types.js';

interface Frame {
  record: PackageRecord;
  next: number;
}

function describeRequirement(dependent: PackageRecord, spec: DependencySpec, installed?: PackageRecord): UnsatisfiedRequirement {
  return {
    dependent: dependent.name,
    dependency: spec.name,
    requirement: formatDependencySpec(spec),
    ...(installed ? { installedVersion: installed.version } : {})
  };
}

/**
 * Order in which `target` and everything it depends on must be loaded:
 * each dependency before its dependents, siblings in declaration order.
 *
 * The walk keeps an explicit stack so deep graphs do not grow the call
 * stack. A node met again while still `visiting` closes a cycle.
 * Missing or version-mismatched dependencies are gathered over the whole
 * walk and reported together, unless `allowMissing` is set, in which case
 * they are skipped.
 */
export function resolveLoadOrder(
  target: string,
  installed: EffectiveSet,
  options: LoadOrderOptions = {}
): PackageRecord[] {
  const root = installed.get(target);
  if (!root) {
    throw new PackageNotFoundError(target);
  }

  const order: PackageRecord[] = [];
  const marks = new Map<string, VisitState>();
  const unsatisfied: UnsatisfiedRequirement[] = [];
  const path: string[] = [root.name];
  const stack: Frame[] = [{ record: root, next: 0 }];
  marks.set(root.name, 'visiting');

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    const spec = frame.record.dependencies[frame.next];
    if (!spec) {
      stack.pop();
      path.pop();
      marks.set(frame.record.name, 'done');
      order.push(frame.record);
      continue;
    }
    frame.next++;

    const mark = marks.get(spec.name);
    if (mark === 'visiting') {
      const start = path.indexOf(spec.name);
      throw new CyclicDependencyError([...path.slice(start), spec.name]);
    }

    const dependency = installed.get(spec.name);
    if (!dependency || !satisfiesDependency(dependency.version, spec)) {
      const requirement = describeRequirement(frame.record, spec, dependency);
      if (!options.allowMissing) {
        unsatisfied.push(requirement);
        continue;
      }
      const warning = `${requirement.dependent}: ignoring unsatisfied dependency ${requirement.requirement}`;
      logger.warn(warning);
      options.onWarning?.(warning);
      if (!dependency) continue;
    }

    if (mark === 'done') continue;

    marks.set(spec.name, 'visiting');
    path.push(spec.name);
    stack.push({ record: dependency, next: 0 });
  }

  if (unsatisfied.length > 0) {
    throw new UnsatisfiedDependencyError(unsatisfied);
  }

  return order;
}
