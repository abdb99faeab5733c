/**
 * Command dispatch
 *
 * Every user-facing operation is one variant of PkgCommand. executeCommand
 * runs exactly one handler per variant; adding a variant without a handler
 * fails to compile.
 */

import type { RegistryScope } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import type { ConfigManager } from './config.js';
import { configManager } from './config.js';
import { installPackages, resolveTargetScope, type InstallOptions, type InstallResult } from './install/install-orchestrator.js';
import { runUninstallPipeline, type UninstallOptions, type UninstallPipelineResult } from './uninstall/uninstall-pipeline.js';
import { loadPackages, unloadPackages, type LoadResult, type UnloadResult } from './load/load-manager.js';
import { runListPipeline, runRemoteListPipeline, type ListPackageReport } from './list/list-pipeline.js';
import { runDescribePipeline, type PackageDescription } from './describe/describe-pipeline.js';
import { runUpdate, type UpdateRunResult } from './update/update-checker.js';
import { rebuildRegistry, type RebuildResult } from './rebuild/rebuild-pipeline.js';
import { buildBinaryPackages, type BuildResult } from './build/build-pipeline.js';
import { runTestPipeline, type TestPipelineResult } from './test/test-pipeline.js';
import { runPrefixSetting, runRegistryPathSetting, type PrefixSettings } from './settings/settings.js';

export type PkgCommand =
  | { kind: 'install'; sources: string[]; options: InstallOptions }
  | { kind: 'uninstall'; names: string[]; options: UninstallOptions }
  | { kind: 'load'; names: string[]; noDeps: boolean }
  | { kind: 'unload'; names: string[]; noDeps: boolean }
  | { kind: 'list'; names: string[]; forge: boolean }
  | { kind: 'describe'; names: string[]; verbose: boolean }
  | { kind: 'update'; names: string[]; noDeps: boolean }
  | { kind: 'rebuild'; names: string[]; preferLocal: boolean; preferGlobal: boolean }
  | { kind: 'build'; buildDir: string; sources: string[]; noDeps: boolean }
  | { kind: 'test'; names: string[]; noDeps: boolean }
  | { kind: 'prefix'; prefix?: string; archPrefix?: string; global: boolean }
  | { kind: 'local-list'; file?: string }
  | { kind: 'global-list'; file?: string };

export type PkgCommandResult =
  | { kind: 'install'; result: InstallResult }
  | { kind: 'uninstall'; result: UninstallPipelineResult }
  | { kind: 'load'; result: LoadResult }
  | { kind: 'unload'; result: UnloadResult }
  | { kind: 'list'; installed: ListPackageReport[] }
  | { kind: 'list-remote'; names: string[] }
  | { kind: 'describe'; descriptions: PackageDescription[] }
  | { kind: 'update'; result: UpdateRunResult }
  | { kind: 'rebuild'; result: RebuildResult }
  | { kind: 'build'; result: BuildResult }
  | { kind: 'test'; result: TestPipelineResult }
  | { kind: 'prefix'; settings: PrefixSettings }
  | { kind: 'registry-path'; scope: RegistryScope; path: string };

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

export async function executeCommand(
  command: PkgCommand,
  ctx: ExecutionContext,
  config: ConfigManager = configManager
): Promise<PkgCommandResult> {
  switch (command.kind) {
    case 'install':
      return { kind: 'install', result: await installPackages(command.sources, command.options, ctx) };
    case 'uninstall':
      return { kind: 'uninstall', result: await runUninstallPipeline(command.names, command.options, ctx) };
    case 'load':
      return { kind: 'load', result: await loadPackages(command.names, ctx, { allowMissing: command.noDeps }) };
    case 'unload':
      return { kind: 'unload', result: await unloadPackages(command.names, ctx, { allowMissing: command.noDeps }) };
    case 'list':
      return command.forge
        ? { kind: 'list-remote', names: await runRemoteListPipeline(ctx) }
        : { kind: 'list', installed: await runListPipeline(command.names, ctx) };
    case 'describe':
      return { kind: 'describe', descriptions: await runDescribePipeline(command.names, { verbose: command.verbose }, ctx) };
    case 'update':
      return { kind: 'update', result: await runUpdate(command.names, { noDeps: command.noDeps }, ctx) };
    case 'rebuild': {
      const scope = resolveTargetScope(command, ctx.privileged);
      return { kind: 'rebuild', result: await rebuildRegistry(scope, command.names, ctx) };
    }
    case 'build':
      return { kind: 'build', result: await buildBinaryPackages(command.buildDir, command.sources, { noDeps: command.noDeps }, ctx) };
    case 'test':
      return { kind: 'test', result: await runTestPipeline(command.names, { noDeps: command.noDeps }, ctx) };
    case 'prefix': {
      const values = {
        ...(command.prefix ? { prefix: command.prefix } : {}),
        ...(command.archPrefix ? { archPrefix: command.archPrefix } : {})
      };
      const settings = await runPrefixSetting(command.global ? 'global' : 'local', values, config, ctx);
      return { kind: 'prefix', settings };
    }
    case 'local-list':
      return { kind: 'registry-path', scope: 'local', path: await runRegistryPathSetting('local', command.file, config, ctx) };
    case 'global-list':
      return { kind: 'registry-path', scope: 'global', path: await runRegistryPathSetting('global', command.file, config, ctx) };
    default:
      return assertNever(command);
  }
}

/**
 * Whether a finished command left some package behind (partial batch failure
 * or failed self tests)
 */
export function hasFailures(result: PkgCommandResult): boolean {
  switch (result.kind) {
    case 'install':
      return result.result.failures.length > 0;
    case 'build':
      return result.result.failures.length > 0;
    case 'update':
      return result.result.installs.some(install => install.failures.length > 0);
    case 'test':
      return result.result.failed > 0;
    default:
      return false;
  }
}
