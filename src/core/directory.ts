import * as os from 'os';
import * as path from 'path';
import type { NumpkgDirectories } from '../types/index.js';
import type { InstallPaths, RegistryPaths } from '../types/execution-context.js';
import { DEFAULT_GLOBAL_HOME, DIR_PATTERNS, ENV_VARS, FILE_PATTERNS, NUMPKG_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Directory resolution.
 *
 * Per-user state lives under ~/.numpkg (or $NUMPKG_HOME); system-wide state
 * under $NUMPKG_GLOBAL_HOME, defaulting to a shared location.
 */

export function getNumpkgHome(): string {
  return process.env[ENV_VARS.HOME] || path.join(os.homedir(), DIR_PATTERNS.NUMPKG);
}

export function getGlobalHome(): string {
  return process.env[ENV_VARS.GLOBAL_HOME] || DEFAULT_GLOBAL_HOME;
}

export function getNumpkgDirectories(): NumpkgDirectories {
  const home = getNumpkgHome();

  return {
    config: home,
    data: home,
    runtime: path.join(os.tmpdir(), 'numpkg')
  };
}

/**
 * Ensure all numpkg directories exist
 */
export async function ensureNumpkgDirectories(): Promise<NumpkgDirectories> {
  const dirs = getNumpkgDirectories();

  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.data),
      ensureDir(dirs.runtime)
    ]);

    logger.debug('numpkg directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create numpkg directories', { error, directories: dirs });
    throw error;
  }
}

export function getDefaultRegistryPaths(): RegistryPaths {
  return {
    local: process.env[ENV_VARS.LOCAL_LIST] || path.join(getNumpkgHome(), FILE_PATTERNS.LOCAL_REGISTRY),
    global: process.env[ENV_VARS.GLOBAL_LIST] || path.join(getGlobalHome(), FILE_PATTERNS.GLOBAL_REGISTRY)
  };
}

export function getDefaultInstallPaths(): InstallPaths {
  const home = getNumpkgHome();
  const globalHome = getGlobalHome();

  return {
    prefix: path.join(home, NUMPKG_DIRS.PACKAGES),
    archPrefix: path.join(home, NUMPKG_DIRS.ARCH),
    globalPrefix: path.join(globalHome, NUMPKG_DIRS.PACKAGES),
    globalArchPrefix: path.join(globalHome, NUMPKG_DIRS.ARCH)
  };
}

/**
 * Installed directory name of one package version, e.g. "signal-1.4.5"
 */
export function getPackageDirName(name: string, version: string): string {
  return `${name}-${version}`;
}

export function getPackageInstallDirectories(
  name: string,
  version: string,
  prefix: string,
  archPrefix: string
): { directory: string; archDirectory: string } {
  const dirName = getPackageDirName(name, version);
  return {
    directory: path.join(prefix, dirName),
    archDirectory: path.join(archPrefix, dirName)
  };
}
