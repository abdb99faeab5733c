/**
 * Shared constants for the numpkg CLI application
 * Single source of truth for directory names, file patterns and defaults.
 */

export const DIR_PATTERNS = {
  NUMPKG: '.numpkg'
} as const;

export const FILE_PATTERNS = {
  PACKAGE_YML: 'package.yml',
  LOCAL_REGISTRY: 'packages.yml',
  GLOBAL_REGISTRY: 'global-packages.yml',
  SEARCH_PATH: 'search-path.yml',
  MAKEFILE: 'Makefile',
  ARCHIVE_EXTENSIONS: ['.tar.gz', '.tgz', '.tar'],
} as const;

export const NUMPKG_DIRS = {
  PACKAGES: 'packages',
  ARCH: 'arch'
} as const;

/**
 * Canonical directories within a staged package source (relative to its root)
 */
export const PACKAGE_PATHS = {
  /** Interpreted files, copied to the package directory */
  INST: 'inst',
  /** Native sources, built in place by the toolchain */
  SRC: 'src',
} as const;

/**
 * File extensions the build toolchain treats as compiled, architecture dependent output
 */
export const ARCH_FILE_EXTENSIONS = ['.so', '.dylib', '.dll'] as const;

export const ENV_VARS = {
  HOME: 'NUMPKG_HOME',
  GLOBAL_HOME: 'NUMPKG_GLOBAL_HOME',
  LOCAL_LIST: 'NUMPKG_LOCAL_LIST',
  GLOBAL_LIST: 'NUMPKG_GLOBAL_LIST',
  INDEX_URL: 'NUMPKG_INDEX_URL',
  VERBOSE: 'NUMPKG_VERBOSE',
  LOG_LEVEL: 'NUMPKG_LOG_LEVEL'
} as const;

export const DEFAULT_INDEX_URL = 'https://packages.numpkg.dev';

export const DEFAULT_GLOBAL_HOME = '/usr/local/share/numpkg';

export const REGISTRY_HEADER_COMMENT = '# This file is managed by numpkg. Do not edit manually.';
