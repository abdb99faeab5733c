import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ExecutionContext } from '../src/types/execution-context.js';
import type { PackageRecord, RegistryScope } from '../src/types/index.js';
import type {
  BuildManifest,
  BuildToolchain,
  Collaborators,
  PackageTestRunner,
  PackageTestSummary,
  RemoteIndexClient
} from '../src/core/ports/collaborators.js';
import type { OutputPort, ProgressSpinner } from '../src/core/ports/output.js';
import { DefaultArchiveFetcher } from '../src/core/adapters/archive-fetcher.js';
import { MakeBuildToolchain } from '../src/core/adapters/make-toolchain.js';
import { SearchPathFileActivator } from '../src/core/adapters/search-path-activator.js';
import { BuildError, PackageNotFoundError } from '../src/utils/errors.js';
import { readPackageManifest } from '../src/utils/package-manifest.js';
import { createRegistry, persistRegistry, upsertRecord } from '../src/core/registry/registry-store.js';
import { parseDependencySpec } from '../src/utils/dependency-spec.js';

export async function createTempDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), `numpkg-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface SourceSpec {
  name: string;
  version: string;
  depends?: string[];
  description?: string;
  /** Files under inst/, relative path -> content */
  files?: Record<string, string>;
  /** Compiled files placed in src/, file name -> content */
  archFiles?: Record<string, string>;
}

/**
 * Write an unpacked package source at `<root>/<name>-<version>` and return its path
 */
export async function writePackageSource(root: string, spec: SourceSpec): Promise<string> {
  const dir = path.join(root, `${spec.name}-${spec.version}`);
  const lines = [`name: ${spec.name}`, `version: "${spec.version}"`];
  if (spec.description) lines.push(`description: ${spec.description}`);
  if (spec.depends && spec.depends.length > 0) {
    lines.push('depends:', ...spec.depends.map(dep => `  - "${dep}"`));
  }
  await fs.mkdir(path.join(dir, 'inst'), { recursive: true });
  await fs.writeFile(path.join(dir, 'package.yml'), `${lines.join('\n')}\n`, 'utf8');

  for (const [rel, content] of Object.entries(spec.files ?? { [`${spec.name}.txt`]: `${spec.name}\n` })) {
    const target = path.join(dir, 'inst', rel);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
  }
  for (const [file, content] of Object.entries(spec.archFiles ?? {})) {
    await fs.mkdir(path.join(dir, 'src'), { recursive: true });
    await fs.writeFile(path.join(dir, 'src', file), content, 'utf8');
  }
  return dir;
}

export function makeRecord(name: string, version: string, dependencies: string[] = [], overrides: Partial<PackageRecord> = {}): PackageRecord {
  return {
    name,
    version,
    directory: `/pkgs/${name}-${version}`,
    archDirectory: '',
    dependencies: dependencies.map(parseDependencySpec),
    installer: 'user',
    ...overrides
  };
}

export function makeSet(...records: PackageRecord[]): Map<string, PackageRecord> {
  return new Map(records.map(record => [record.name, record]));
}

/**
 * Remote index backed by package sources on disk: download URLs are the
 * source directories, which the default fetcher copies.
 */
export class FakeIndexClient implements RemoteIndexClient {
  readonly lookups: string[] = [];

  constructor(
    private readonly sourcesRoot: string,
    private readonly latest: Record<string, string>,
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async latestVersion(name: string): Promise<string> {
    this.lookups.push(name);
    if (this.failing.has(name)) {
      throw new Error(`index unavailable for ${name}`);
    }
    const version = this.latest[name];
    if (!version) {
      throw new PackageNotFoundError(name, { location: 'found in the package index' });
    }
    return version;
  }

  downloadUrl(name: string, version: string): string {
    return path.join(this.sourcesRoot, `${name}-${version}`);
  }

  async listPackages(): Promise<string[]> {
    return Object.keys(this.latest).sort();
  }
}

/**
 * Default toolchain that fails for the named packages
 */
export class FailingToolchain implements BuildToolchain {
  private readonly inner = new MakeBuildToolchain();

  constructor(private readonly failFor: ReadonlySet<string>) {}

  async build(stagingPath: string): Promise<BuildManifest> {
    const manifest = await readPackageManifest(stagingPath);
    if (this.failFor.has(manifest.name)) {
      throw new BuildError(stagingPath, 'compiler exited with status 2');
    }
    return await this.inner.build(stagingPath);
  }
}

export class RecordingTestRunner implements PackageTestRunner {
  readonly runs: Array<{ name: string; directories: string[]; active: string[] }> = [];

  constructor(
    private readonly activeDirectories: () => Promise<string[]>,
    private readonly results: Record<string, PackageTestSummary> = {}
  ) {}

  async run(name: string, directories: string[]): Promise<PackageTestSummary> {
    this.runs.push({ name, directories, active: await this.activeDirectories() });
    return this.results[name] ?? { passed: directories.length, failed: 0 };
  }
}

export class RecordingOutput implements OutputPort {
  readonly lines: string[] = [];

  info(message: string): void { this.lines.push(`info: ${message}`); }
  step(message: string): void { this.lines.push(`step: ${message}`); }
  message(message: string): void { this.lines.push(message); }
  success(message: string): void { this.lines.push(`success: ${message}`); }
  error(message: string): void { this.lines.push(`error: ${message}`); }
  warn(message: string): void { this.lines.push(`warn: ${message}`); }
  note(content: string, title?: string): void { this.lines.push(`note: ${title ?? ''}\n${content}`); }
  spinner(): ProgressSpinner {
    return { start: () => {}, stop: () => {}, message: () => {} };
  }
}

export interface TestEnvironment {
  root: string;
  /** Where package sources are written */
  sources: string;
  ctx: ExecutionContext;
  output: RecordingOutput;
  activator: SearchPathFileActivator;
}

/**
 * Execution context rooted in a temporary directory, with the default
 * fetcher, toolchain and search-path activator and in-process fakes for the
 * index and the test runner.
 */
export async function createTestEnvironment(
  options: { privileged?: boolean; latest?: Record<string, string>; collaborators?: Partial<Collaborators> } = {}
): Promise<TestEnvironment> {
  const root = await createTempDir('env');
  const sources = path.join(root, 'sources');
  await fs.mkdir(sources, { recursive: true });

  const activator = new SearchPathFileActivator(path.join(root, 'search-path.yml'));
  const output = new RecordingOutput();
  const collaborators: Collaborators = {
    fetcher: new DefaultArchiveFetcher(),
    toolchain: new MakeBuildToolchain(),
    activator,
    index: new FakeIndexClient(sources, options.latest ?? {}),
    testRunner: new RecordingTestRunner(() => activator.activeDirectories()),
    ...options.collaborators
  };

  const ctx: ExecutionContext = {
    registryPaths: {
      local: path.join(root, 'local', 'packages.yml'),
      global: path.join(root, 'global', 'global-packages.yml')
    },
    installPaths: {
      prefix: path.join(root, 'local', 'packages'),
      archPrefix: path.join(root, 'local', 'arch'),
      globalPrefix: path.join(root, 'global', 'packages'),
      globalArchPrefix: path.join(root, 'global', 'arch')
    },
    privileged: options.privileged ?? false,
    stagingDirectory: path.join(root, 'tmp'),
    collaborators,
    output
  };

  return { root, sources, ctx, output, activator };
}

/**
 * Write a registry file for `scope` holding exactly `records`
 */
export async function seedRegistry(ctx: ExecutionContext, scope: RegistryScope, ...records: PackageRecord[]): Promise<void> {
  const registry = createRegistry(scope, ctx.registryPaths[scope]);
  for (const record of records) {
    upsertRecord(registry, record);
  }
  await persistRegistry(registry);
}
