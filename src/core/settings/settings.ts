/**
 * Settings commands: where packages are installed and where the registries
 * live. Values are written to the configuration file and take effect from
 * the next command on.
 */

import { resolve } from 'path';
import type { RegistryScope } from '../../types/index.js';
import type { ExecutionContext, InstallPaths } from '../../types/execution-context.js';
import type { ConfigManager } from '../config.js';
import { ENV_VARS } from '../../constants/index.js';
import { resolveOutput } from '../ports/resolve.js';

export interface PrefixSettings {
  scope: RegistryScope;
  prefix: string;
  archPrefix: string;
}

function prefixesOf(paths: InstallPaths, scope: RegistryScope): PrefixSettings {
  return scope === 'global'
    ? { scope, prefix: paths.globalPrefix, archPrefix: paths.globalArchPrefix }
    : { scope, prefix: paths.prefix, archPrefix: paths.archPrefix };
}

/**
 * Show the install prefixes of a scope, or set them. When only `prefix` is
 * given the arch prefix is set to the same directory.
 */
export async function runPrefixSetting(
  scope: RegistryScope,
  values: { prefix?: string; archPrefix?: string },
  config: ConfigManager,
  ctx: ExecutionContext
): Promise<PrefixSettings> {
  if (!values.prefix) {
    return prefixesOf(ctx.installPaths, scope);
  }

  const prefix = resolve(values.prefix);
  const archPrefix = resolve(values.archPrefix ?? values.prefix);
  if (scope === 'global') {
    await config.set('globalPrefix', prefix);
    await config.set('globalArchPrefix', archPrefix);
    ctx.installPaths = { ...ctx.installPaths, globalPrefix: prefix, globalArchPrefix: archPrefix };
  } else {
    await config.set('prefix', prefix);
    await config.set('archPrefix', archPrefix);
    ctx.installPaths = { ...ctx.installPaths, prefix, archPrefix };
  }
  return { scope, prefix, archPrefix };
}

/**
 * Show or set the registry file of a scope
 */
export async function runRegistryPathSetting(
  scope: RegistryScope,
  file: string | undefined,
  config: ConfigManager,
  ctx: ExecutionContext
): Promise<string> {
  if (!file) {
    return ctx.registryPaths[scope];
  }

  const path = resolve(file);
  await config.set(scope === 'global' ? 'globalList' : 'localList', path);
  const envName = scope === 'global' ? ENV_VARS.GLOBAL_LIST : ENV_VARS.LOCAL_LIST;
  if (process.env[envName]) {
    resolveOutput(ctx).warn(`${envName} is set and takes precedence over the configured ${scope} registry file`);
  }
  ctx.registryPaths = scope === 'global'
    ? { ...ctx.registryPaths, global: path }
    : { ...ctx.registryPaths, local: path };
  return path;
}
