import { NumpkgError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the numpkg CLI
 */

export class PackageNotFoundError extends NumpkgError {
  public readonly packageNames: string[];

  constructor(packageNames: string | string[], options: { hint?: string; location?: string } = {}) {
    const names = Array.isArray(packageNames) ? packageNames : [packageNames];
    const label = names.length === 1 ? `Package '${names[0]}' is` : `Packages ${names.map(n => `'${n}'`).join(', ')} are`;
    const location = options.location ?? 'installed';
    super(`${label} not ${location}${options.hint ? `. ${options.hint}` : ''}`, ErrorCodes.PACKAGE_NOT_FOUND, { packageNames: names });
    this.name = 'PackageNotFoundError';
    this.packageNames = names;
  }
}

export class InvalidVersionError extends NumpkgError {
  constructor(version: string, reason: string) {
    super(`Invalid version '${version}': ${reason}`, ErrorCodes.INVALID_VERSION, { version });
    this.name = 'InvalidVersionError';
  }
}

export class CorruptRegistryError extends NumpkgError {
  constructor(registryPath: string, reason: string) {
    super(`Corrupt package registry ${registryPath}: ${reason}. Run 'numpkg rebuild' to regenerate it`, ErrorCodes.CORRUPT_REGISTRY, { registryPath, reason });
    this.name = 'CorruptRegistryError';
  }
}

export class CyclicDependencyError extends NumpkgError {
  public readonly cycle: string[];

  constructor(cycle: string[], message?: string, code: string = ErrorCodes.CYCLIC_DEPENDENCY) {
    super(message ?? `Circular dependency detected: ${cycle.join(' -> ')}`, code, { cycle });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

/**
 * A cycle confined to the packages of a single install request
 */
export class UnresolvableRequestError extends CyclicDependencyError {
  constructor(cycle: string[]) {
    super(
      cycle,
      `Cannot order install request, packages depend on each other: ${cycle.join(' -> ')}`,
      ErrorCodes.UNRESOLVABLE_REQUEST
    );
    this.name = 'UnresolvableRequestError';
  }
}

export interface UnsatisfiedRequirement {
  /** Package that declares the dependency */
  dependent: string;
  /** Name of the required package */
  dependency: string;
  /** Dependency in its textual form, e.g. "control >= 1.2" */
  requirement: string;
  /** Installed version when present but too old/new */
  installedVersion?: string;
}

export class UnsatisfiedDependencyError extends NumpkgError {
  public readonly requirements: UnsatisfiedRequirement[];

  constructor(requirements: UnsatisfiedRequirement[]) {
    const lines = requirements.map(r =>
      `${r.dependent} needs ${r.requirement}${r.installedVersion ? ` (installed: ${r.installedVersion})` : ' (not installed)'}`
    );
    super(`Unsatisfied dependencies:\n  ${lines.join('\n  ')}`, ErrorCodes.UNSATISFIED_DEPENDENCY, { requirements });
    this.name = 'UnsatisfiedDependencyError';
    this.requirements = requirements;
  }

  get missingNames(): string[] {
    return Array.from(new Set(this.requirements.map(r => r.dependency)));
  }
}

export class BlockedByError extends NumpkgError {
  public readonly blockedBy: string[];

  constructor(action: 'unload' | 'uninstall', targets: string[], blockedBy: string[]) {
    super(
      `Cannot ${action} ${targets.join(', ')}: required by ${blockedBy.join(', ')}. Use --nodeps to ${action} anyway`,
      ErrorCodes.BLOCKED_BY,
      { action, targets, blockedBy }
    );
    this.name = 'BlockedByError';
    this.blockedBy = blockedBy;
  }
}

export class FetchError extends NumpkgError {
  constructor(locator: string, reason: string) {
    super(`Failed to fetch '${locator}': ${reason}`, ErrorCodes.FETCH_ERROR, { locator });
    this.name = 'FetchError';
  }
}

export class BuildError extends NumpkgError {
  constructor(stagingPath: string, reason: string) {
    super(`Build failed in ${stagingPath}: ${reason}`, ErrorCodes.BUILD_ERROR, { stagingPath });
    this.name = 'BuildError';
  }
}

export class InvalidPackageError extends NumpkgError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package: ${reason}`, ErrorCodes.INVALID_PACKAGE, details);
    this.name = 'InvalidPackageError';
  }
}

export class FileSystemError extends NumpkgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends NumpkgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends NumpkgError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof NumpkgError) {
    // Keep CLI output terse; details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
