import type { DependencySpec, EffectiveSet, PackageRecord } from '../../types/index.js';
import { UnresolvableRequestError, type UnsatisfiedRequirement } from '../../utils/errors.js';
import { formatDependencySpec, satisfiesDependency } from '../../utils/dependency-spec.js';
import type { VisitState } from './types.js';

export interface InstallCandidate {
  name: string;
  version: string;
  dependencies: DependencySpec[];
}

/**
 * Order the packages of one install request so that a package never comes
 * before a dependency that is part of the same request. Ties keep request
 * order. Candidates whose exact name and version are already installed are
 * left out. Dependencies outside the request are not ordered here.
 */
export function resolveInstallOrder(requested: readonly InstallCandidate[], installed: EffectiveSet): string[] {
  const pending = new Map<string, InstallCandidate>();
  for (const candidate of requested) {
    if (installed.get(candidate.name)?.version === candidate.version) continue;
    if (!pending.has(candidate.name)) {
      pending.set(candidate.name, candidate);
    }
  }

  const order: string[] = [];
  const marks = new Map<string, VisitState>();

  for (const root of pending.values()) {
    if (marks.has(root.name)) continue;

    const path: string[] = [root.name];
    const stack: Array<{ candidate: InstallCandidate; next: number }> = [{ candidate: root, next: 0 }];
    marks.set(root.name, 'visiting');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;

      const spec = frame.candidate.dependencies[frame.next];
      if (!spec) {
        stack.pop();
        path.pop();
        marks.set(frame.candidate.name, 'done');
        order.push(frame.candidate.name);
        continue;
      }
      frame.next++;

      const dependency = pending.get(spec.name);
      if (!dependency) continue;

      const mark = marks.get(spec.name);
      if (mark === 'visiting') {
        throw new UnresolvableRequestError([...path.slice(path.indexOf(spec.name)), spec.name]);
      }
      if (mark === 'done') continue;

      marks.set(spec.name, 'visiting');
      path.push(spec.name);
      stack.push({ candidate: dependency, next: 0 });
    }
  }

  return order;
}

/**
 * Declared dependencies of `candidate` that the installed set does not satisfy
 */
export function findUnsatisfiedDependencies(candidate: InstallCandidate, installed: EffectiveSet): UnsatisfiedRequirement[] {
  const unsatisfied: UnsatisfiedRequirement[] = [];
  for (const spec of candidate.dependencies) {
    const record: PackageRecord | undefined = installed.get(spec.name);
    if (record && satisfiesDependency(record.version, spec)) continue;
    unsatisfied.push({
      dependent: candidate.name,
      dependency: spec.name,
      requirement: formatDependencySpec(spec),
      ...(record ? { installedVersion: record.version } : {})
    });
  }
  return unsatisfied;
}
