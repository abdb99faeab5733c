import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';

import { installPackages, resolveTargetScope } from '../../../src/core/install/install-orchestrator.js';
import { loadRegistry } from '../../../src/core/registry/registry-store.js';
import { MakeBuildToolchain } from '../../../src/core/adapters/make-toolchain.js';
import type { BuildManifest, BuildToolchain } from '../../../src/core/ports/collaborators.js';
import { exists } from '../../../src/utils/fs.js';
import { CorruptRegistryError, ValidationError } from '../../../src/utils/errors.js';
import {
  FailingToolchain,
  createTestEnvironment,
  removeTempDir,
  writePackageSource,
  type TestEnvironment
} from '../../test-helpers.js';

/**
 * Builds normally but reports a compiled file that does not exist, so the
 * copy into the architecture directory fails.
 */
class MissingArchFileToolchain implements BuildToolchain {
  private readonly inner = new MakeBuildToolchain();

  async build(stagingPath: string): Promise<BuildManifest> {
    const manifest = await this.inner.build(stagingPath);
    return { ...manifest, archFiles: [join(stagingPath, 'src', 'missing.so')] };
  }
}

describe('installPackages', () => {
  let env: TestEnvironment | undefined;

  afterEach(async () => {
    if (env) await removeTempDir(env.root);
    env = undefined;
  });

  it('installs a request in dependency order and registers it locally', async () => {
    env = await createTestEnvironment();
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4', depends: ['control >= 3'] });
    const control = await writePackageSource(env.sources, { name: 'control', version: '3.3', description: 'Control systems' });

    const result = await installPackages([signal, control], {}, env.ctx);

    assert.equal(result.scope, 'local');
    assert.deepEqual(result.installed.map(pkg => pkg.record.name), ['control', 'signal']);
    assert.deepEqual(result.failures, []);

    const registry = await loadRegistry(env.ctx.registryPaths.local, 'local');
    const record = registry.records.get('control');
    assert.equal(record?.directory, join(env.ctx.installPaths.prefix, 'control-3.3'));
    assert.equal(record?.archDirectory, '');
    assert.equal(record?.description, 'Control systems');
    assert.equal(record?.installer, 'user');
    assert.equal(await readFile(join(env.ctx.installPaths.prefix, 'control-3.3', 'control.txt'), 'utf8'), 'control\n');
    assert.ok(await exists(join(env.ctx.installPaths.prefix, 'signal-1.4', 'package.yml')));
  });

  it('installs into the global registry for a privileged process', async () => {
    env = await createTestEnvironment({ privileged: true });
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });

    const result = await installPackages([io], {}, env.ctx);

    assert.equal(result.scope, 'global');
    const registry = await loadRegistry(env.ctx.registryPaths.global, 'global');
    assert.equal(registry.records.get('io')?.installer, 'system');
    assert.equal(registry.records.get('io')?.directory, join(env.ctx.installPaths.globalPrefix, 'io-2.0'));
  });

  it('skips a version that is already installed', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    await installPackages([io], {}, env.ctx);

    const result = await installPackages([io], {}, env.ctx);
    assert.deepEqual(result.installed, []);
    assert.deepEqual(result.skipped, [{ name: 'io', version: '2.0', reason: 'already installed' }]);
  });

  it('installs a local copy of a version the global registry already has', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    await installPackages([io], { preferGlobal: true }, env.ctx);

    const result = await installPackages([io], { preferLocal: true }, env.ctx);

    assert.deepEqual(result.skipped, []);
    assert.deepEqual(result.installed.map(pkg => pkg.record.directory), [join(env.ctx.installPaths.prefix, 'io-2.0')]);
  });

  it('keeps going after a package fails to build', async () => {
    env = await createTestEnvironment({ collaborators: { toolchain: new FailingToolchain(new Set(['signal'])) } });
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4' });
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });

    const result = await installPackages([signal, io], {}, env.ctx);

    assert.deepEqual(result.installed.map(pkg => pkg.record.name), ['io']);
    assert.equal(result.failures.length, 1);
    assert.equal(result.failures[0]?.source, signal);
    assert.equal(result.failures[0]?.error.name, 'BuildError');
  });

  it('fails a package whose dependency is missing', async () => {
    env = await createTestEnvironment();
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4', depends: ['control >= 3'] });

    const result = await installPackages([signal], {}, env.ctx);

    assert.deepEqual(result.installed, []);
    assert.equal(result.failures[0]?.name, 'signal');
    assert.equal(result.failures[0]?.error.message, 'Unsatisfied dependencies:\n  signal needs control >= 3 (not installed)');
    assert.equal(await exists(join(env.ctx.installPaths.prefix, 'signal-1.4')), false);
  });

  it('installs without its dependencies when asked and warns', async () => {
    env = await createTestEnvironment();
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4', depends: ['control >= 3'] });

    const result = await installPackages([signal], { noDeps: true }, env.ctx);

    assert.deepEqual(result.installed.map(pkg => pkg.record.name), ['signal']);
    assert.ok(env.output.lines.includes('warn: signal: installing without control >= 3'));
  });

  it('replaces a previous version and keeps it loaded', async () => {
    env = await createTestEnvironment();
    const old = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    const next = await writePackageSource(env.sources, { name: 'io', version: '2.1' });
    await installPackages([old], {}, env.ctx);
    await env.activator.activate(join(env.ctx.installPaths.prefix, 'io-2.0'), '');

    const result = await installPackages([next], {}, env.ctx);

    assert.equal(result.installed[0]?.previousVersion, '2.0');
    assert.deepEqual(await readdir(env.ctx.installPaths.prefix), ['io-2.1']);
    assert.deepEqual(await env.activator.activeDirectories(), [join(env.ctx.installPaths.prefix, 'io-2.1')]);
  });

  it('keeps the previous version installed and loaded when copying the new one fails', async () => {
    env = await createTestEnvironment();
    const old = await writePackageSource(env.sources, { name: 'io', version: '1.0' });
    const next = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    await installPackages([old], {}, env.ctx);
    const oldDirectory = join(env.ctx.installPaths.prefix, 'io-1.0');
    await env.activator.activate(oldDirectory, '');

    env.ctx.collaborators.toolchain = new MissingArchFileToolchain();
    const result = await installPackages([next], {}, env.ctx);

    assert.deepEqual(result.installed, []);
    assert.equal(result.failures[0]?.name, 'io');
    assert.equal(result.failures[0]?.error.name, 'FileSystemError');

    const registry = await loadRegistry(env.ctx.registryPaths.local, 'local');
    assert.equal(registry.records.get('io')?.version, '1.0');
    assert.equal(registry.records.get('io')?.directory, oldDirectory);
    assert.deepEqual(await readdir(env.ctx.installPaths.prefix), ['io-1.0']);
    assert.equal(await readFile(join(oldDirectory, 'io.txt'), 'utf8'), 'io\n');
    assert.equal(await exists(join(env.ctx.installPaths.archPrefix, 'io-2.0')), false);
    assert.deepEqual(await env.activator.activeDirectories(), [oldDirectory]);
  });

  it('removes its staging directory after success and after failure', async () => {
    env = await createTestEnvironment({ collaborators: { toolchain: new FailingToolchain(new Set(['signal'])) } });
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4' });

    await installPackages([io], {}, env.ctx);
    assert.deepEqual(await readdir(env.ctx.stagingDirectory), []);

    const result = await installPackages([signal], {}, env.ctx);
    assert.equal(result.failures.length, 1);
    assert.deepEqual(await readdir(env.ctx.stagingDirectory), []);
  });

  it('installs same-named source directories as separate packages', async () => {
    env = await createTestEnvironment();
    const alpha = await writePackageSource(join(env.sources, 'a'), { name: 'alpha', version: '1.0' });
    const beta = await writePackageSource(join(env.sources, 'b'), { name: 'beta', version: '1.0' });
    const alphaPkg = join(env.sources, 'a', 'pkg');
    const betaPkg = join(env.sources, 'b', 'pkg');
    await rename(alpha, alphaPkg);
    await rename(beta, betaPkg);

    const result = await installPackages([alphaPkg, betaPkg], {}, env.ctx);

    assert.deepEqual(result.failures, []);
    assert.deepEqual(await readdir(join(env.ctx.installPaths.prefix, 'alpha-1.0')), ['alpha.txt', 'package.yml']);
    assert.deepEqual(await readdir(join(env.ctx.installPaths.prefix, 'beta-1.0')), ['beta.txt', 'package.yml']);
  });

  it('rejects a corrupt registry before installing anything', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    await mkdir(join(env.root, 'local'), { recursive: true });
    await writeFile(env.ctx.registryPaths.local, '- io\n');

    await assert.rejects(installPackages([io], {}, env.ctx), CorruptRegistryError);
    assert.equal(await exists(env.ctx.installPaths.prefix), false);
    assert.equal(await readFile(env.ctx.registryPaths.local, 'utf8'), '- io\n');
  });

  it('copies compiled files into the architecture directory', async () => {
    env = await createTestEnvironment();
    const fft = await writePackageSource(env.sources, { name: 'fft', version: '1.0', archFiles: { 'fft.so': 'binary' } });

    const result = await installPackages([fft], {}, env.ctx);

    const archDirectory = join(env.ctx.installPaths.archPrefix, 'fft-1.0');
    assert.equal(result.installed[0]?.record.archDirectory, archDirectory);
    assert.equal(await readFile(join(archDirectory, 'fft.so'), 'utf8'), 'binary');
  });

  it('resolves names through the package index with forge', async () => {
    env = await createTestEnvironment({ latest: { io: '2.0' } });
    await writePackageSource(env.sources, { name: 'io', version: '2.0' });

    const result = await installPackages(['io'], { forge: true }, env.ctx);

    assert.deepEqual(result.installed.map(pkg => `${pkg.record.name} ${pkg.record.version}`), ['io 2.0']);
  });

  it('rejects a request naming the same package twice', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });

    const result = await installPackages([io, io], {}, env.ctx);

    assert.equal(result.installed.length, 1);
    assert.equal(result.failures[0]?.error.message, "Validation error: Package 'io' is requested more than once");
  });

  it('rejects an empty request', async () => {
    env = await createTestEnvironment();
    await assert.rejects(installPackages([], {}, env.ctx), ValidationError);
  });
});

describe('resolveTargetScope', () => {
  it('follows the flags, then the privilege', () => {
    assert.equal(resolveTargetScope({ preferGlobal: true }, false), 'global');
    assert.equal(resolveTargetScope({ preferLocal: true }, true), 'local');
    assert.equal(resolveTargetScope({}, true), 'global');
    assert.equal(resolveTargetScope({}, false), 'local');
  });

  it('rejects both flags together', () => {
    assert.throws(() => resolveTargetScope({ preferLocal: true, preferGlobal: true }, false), {
      message: 'Validation error: Options --local and --global are mutually exclusive'
    });
  });
});
