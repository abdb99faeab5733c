/**
 * Version comparison for dot-separated numeric versions ("1.2.3").
 *
 * Segments compare numerically from the left, at any size. When one version
 * is a strict prefix of the other, the shorter one is older: 1.2 < 1.2.0.
 */

import { InvalidVersionError } from './errors.js';

export type VersionOrder = 'LESS' | 'EQUAL' | 'GREATER';

const SEGMENT_PATTERN = /^\d+$/;

export function parseVersion(version: string): bigint[] {
  const trimmed = version.trim();
  if (trimmed.length === 0) {
    throw new InvalidVersionError(version, 'version is empty');
  }

  return trimmed.split('.').map((segment, index) => {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new InvalidVersionError(version, `segment ${index + 1} ('${segment}') is not a non-negative integer`);
    }
    return BigInt(segment);
  });
}

export function isValidVersion(version: string): boolean {
  try {
    parseVersion(version);
    return true;
  } catch {
    return false;
  }
}

export function compareVersions(a: string, b: string): VersionOrder {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const l = left[i] ?? 0n;
    const r = right[i] ?? 0n;
    if (l !== r) {
      return l < r ? 'LESS' : 'GREATER';
    }
  }

  if (left.length === right.length) return 'EQUAL';
  return left.length < right.length ? 'LESS' : 'GREATER';
}
