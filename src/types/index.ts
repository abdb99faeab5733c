/**
 * Common types and interfaces for the numpkg CLI application
 */

export * from './execution-context.js';

// Core application types
export interface NumpkgDirectories {
  config: string;
  data: string;
  runtime: string;
}

export interface NumpkgConfig {
  /** Install prefix for locally installed packages */
  prefix?: string;
  /** Install prefix for architecture dependent files of local packages */
  archPrefix?: string;
  globalPrefix?: string;
  globalArchPrefix?: string;
  /** Registry file of locally installed packages */
  localList?: string;
  /** Registry file of globally installed packages */
  globalList?: string;
  indexUrl?: string;
  /** File holding the directories active on the environment's search path */
  searchPathFile?: string;
  /**
   * Command used to run a package's self tests. `{dir}` is replaced by each
   * directory of the package under test.
   */
  testCommand?: string[];
}

// Package types

export type RegistryScope = 'local' | 'global';

export type Installer = 'user' | 'system';

export type ConstraintOperator = '>=' | '<=' | '>' | '<' | '==' | '!=';

export interface DependencySpec {
  name: string;
  operator?: ConstraintOperator;
  version?: string;
}

export interface PackageRecord {
  name: string;
  version: string;
  directory: string;
  /** Empty when the package ships no compiled files */
  archDirectory: string;
  dependencies: DependencySpec[];
  installer: Installer;
  description?: string;
  author?: string;
  maintainer?: string;
  license?: string;
  url?: string;
}

/**
 * package.yml found at the root of every package source and installed directory
 */
export interface PackageManifest {
  name: string;
  version: string;
  description?: string;
  author?: string;
  maintainer?: string;
  license?: string;
  url?: string;
  depends: DependencySpec[];
}

export interface Registry {
  scope: RegistryScope;
  path: string;
  records: Map<string, PackageRecord>;
}

export type EffectiveSet = ReadonlyMap<string, PackageRecord>;

// Command option types

/**
 * Flags shared by the package commands, named as commander parses them
 */
export interface PkgCommandOptions {
  /** --nodeps: skip dependency checks */
  nodeps?: boolean;
  local?: boolean;
  global?: boolean;
  forge?: boolean;
  verbose?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class NumpkgError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'NumpkgError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  INVALID_PACKAGE = 'INVALID_PACKAGE',
  INVALID_VERSION = 'INVALID_VERSION',
  CORRUPT_REGISTRY = 'CORRUPT_REGISTRY',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  UNSATISFIED_DEPENDENCY = 'UNSATISFIED_DEPENDENCY',
  UNRESOLVABLE_REQUEST = 'UNRESOLVABLE_REQUEST',
  BLOCKED_BY = 'BLOCKED_BY',
  FETCH_ERROR = 'FETCH_ERROR',
  BUILD_ERROR = 'BUILD_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
