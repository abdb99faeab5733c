/**
 * Execution Context Module
 *
 * Builds the ExecutionContext every command receives. Paths come from, in
 * order of precedence: environment variables, the configuration file, and
 * the defaults under the numpkg home directories.
 */

import { join } from 'path';
import type { NumpkgConfig } from '../types/index.js';
import type { ExecutionContext, ExecutionOptions, InstallPaths, RegistryPaths } from '../types/execution-context.js';
import type { Collaborators } from './ports/collaborators.js';
import { DEFAULT_INDEX_URL, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { configManager } from './config.js';
import { getDefaultInstallPaths, getDefaultRegistryPaths, getNumpkgDirectories, getNumpkgHome } from './directory.js';
import {
  CommandTestRunner,
  DefaultArchiveFetcher,
  HttpIndexClient,
  MakeBuildToolchain,
  SearchPathFileActivator
} from './adapters/index.js';
import { logger } from '../utils/logger.js';

/**
 * Whether the current process may write system-wide locations
 */
export function isPrivilegedProcess(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

function envOverride(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

export function resolveRegistryPaths(config: NumpkgConfig): RegistryPaths {
  const defaults = getDefaultRegistryPaths();
  return {
    local: envOverride(ENV_VARS.LOCAL_LIST) ?? config.localList ?? defaults.local,
    global: envOverride(ENV_VARS.GLOBAL_LIST) ?? config.globalList ?? defaults.global
  };
}

export function resolveInstallPaths(config: NumpkgConfig): InstallPaths {
  const defaults = getDefaultInstallPaths();
  return {
    prefix: config.prefix ?? defaults.prefix,
    archPrefix: config.archPrefix ?? defaults.archPrefix,
    globalPrefix: config.globalPrefix ?? defaults.globalPrefix,
    globalArchPrefix: config.globalArchPrefix ?? defaults.globalArchPrefix
  };
}

export function createDefaultCollaborators(config: NumpkgConfig): Collaborators {
  const indexUrl = envOverride(ENV_VARS.INDEX_URL) ?? config.indexUrl ?? DEFAULT_INDEX_URL;
  const searchPathFile = config.searchPathFile ?? join(getNumpkgHome(), FILE_PATTERNS.SEARCH_PATH);

  return {
    fetcher: new DefaultArchiveFetcher(),
    toolchain: new MakeBuildToolchain(),
    activator: new SearchPathFileActivator(searchPathFile),
    index: new HttpIndexClient(indexUrl),
    testRunner: new CommandTestRunner(config.testCommand)
  };
}

/**
 * Create an ExecutionContext from the configuration file and command options.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const config = await configManager.load();

  const context: ExecutionContext = {
    registryPaths: resolveRegistryPaths(config),
    installPaths: resolveInstallPaths(config),
    privileged: options.privileged ?? isPrivilegedProcess(),
    stagingDirectory: getNumpkgDirectories().runtime,
    collaborators: { ...createDefaultCollaborators(config), ...options.collaborators },
    output: options.output
  };

  logger.debug('Created execution context', {
    registryPaths: context.registryPaths,
    installPaths: context.installPaths,
    privileged: context.privileged
  });

  return context;
}
