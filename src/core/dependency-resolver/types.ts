/**
 * Verdict of an unload/uninstall safety check.
 * `overridden` lists dependents that would have blocked without --nodeps.
 */
export type SafetyVerdict =
  | { kind: 'ok'; overridden: string[] }
  | { kind: 'blocked'; blockedBy: string[] };

export interface LoadOrderOptions {
  /** Skip missing or unsatisfied dependencies instead of failing (--nodeps) */
  allowMissing?: boolean;
  /** Receives one message per skipped dependency when allowMissing is set */
  onWarning?: (message: string) => void;
}

/**
 * Traversal marks for the iterative depth-first walk
 */
export type VisitState = 'visiting' | 'done';
