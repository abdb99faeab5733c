import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

import { loadPackages, unloadPackages } from '../../../src/core/load/load-manager.js';
import { BlockedByError, CorruptRegistryError, PackageNotFoundError, UnsatisfiedDependencyError } from '../../../src/utils/errors.js';
import {
  createTestEnvironment,
  makeRecord,
  removeTempDir,
  seedRegistry,
  type TestEnvironment
} from '../../test-helpers.js';

describe('load manager', () => {
  let env: TestEnvironment | undefined;

  afterEach(async () => {
    if (env) await removeTempDir(env.root);
    env = undefined;
  });

  async function withSignalStack(): Promise<TestEnvironment> {
    const created = await createTestEnvironment();
    await seedRegistry(
      created.ctx,
      'local',
      makeRecord('io', '2.0'),
      makeRecord('control', '3.3', ['io']),
      makeRecord('signal', '1.4', ['control >= 3', 'io'], { archDirectory: '/arch/signal-1.4' })
    );
    return created;
  }

  it('rejects a corrupt registry without touching the search path', async () => {
    env = await createTestEnvironment();
    await mkdir(dirname(env.ctx.registryPaths.global), { recursive: true });
    await writeFile(env.ctx.registryPaths.global, 'packages:\n  io:\n    version: two\n    directory: /pkgs/io\n');

    await assert.rejects(loadPackages(['io'], env.ctx), CorruptRegistryError);
    assert.deepEqual(await env.activator.activeDirectories(), []);
  });

  it('loads dependencies first', async () => {
    env = await withSignalStack();

    const result = await loadPackages(['signal'], env.ctx);

    assert.deepEqual(result.activated.map(record => record.name), ['io', 'control', 'signal']);
    assert.deepEqual(await env.activator.activeDirectories(), [
      '/pkgs/signal-1.4',
      '/arch/signal-1.4',
      '/pkgs/control-3.3',
      '/pkgs/io-2.0'
    ]);
  });

  it('reports packages that were already loaded', async () => {
    env = await withSignalStack();
    await loadPackages(['io'], env.ctx);

    const result = await loadPackages(['control'], env.ctx);

    assert.deepEqual(result.activated.map(record => record.name), ['control']);
    assert.deepEqual(result.alreadyLoaded, ['io']);
  });

  it('activates nothing when a dependency is missing', async () => {
    env = await createTestEnvironment();
    await seedRegistry(env.ctx, 'local', makeRecord('io', '2.0'), makeRecord('signal', '1.4', ['fft']));

    await assert.rejects(loadPackages(['io', 'signal'], env.ctx), UnsatisfiedDependencyError);
    assert.deepEqual(await env.activator.activeDirectories(), []);

    const result = await loadPackages(['signal'], env.ctx, { allowMissing: true });
    assert.deepEqual(result.activated.map(record => record.name), ['signal']);
    assert.deepEqual(env.output.lines, ['warn: signal: ignoring unsatisfied dependency fft']);
  });

  it('names every package that is not installed', async () => {
    env = await withSignalStack();
    await assert.rejects(loadPackages(['io', 'ghost', 'phantom'], env.ctx), (error: unknown) => {
      assert.ok(error instanceof PackageNotFoundError);
      assert.equal(error.message, "Packages 'ghost', 'phantom' are not installed");
      return true;
    });
  });

  it('refuses to unload a dependency of a loaded package', async () => {
    env = await withSignalStack();
    await loadPackages(['signal'], env.ctx);

    await assert.rejects(unloadPackages(['io'], env.ctx), (error: unknown) => {
      assert.ok(error instanceof BlockedByError);
      assert.deepEqual(error.blockedBy, ['control', 'signal']);
      return true;
    });
    assert.equal((await env.activator.activeDirectories()).length, 4);
  });

  it('unloads only the named packages', async () => {
    env = await withSignalStack();
    await loadPackages(['signal'], env.ctx);

    const result = await unloadPackages(['signal'], env.ctx);

    assert.deepEqual(result.deactivated.map(record => record.name), ['signal']);
    assert.deepEqual(await env.activator.activeDirectories(), ['/pkgs/control-3.3', '/pkgs/io-2.0']);
  });

  it('unloads a dependency together with its dependents, or alone with allowMissing', async () => {
    env = await withSignalStack();
    await loadPackages(['control'], env.ctx);

    const forced = await unloadPackages(['io', 'signal'], env.ctx, { allowMissing: true });

    assert.deepEqual(forced.deactivated.map(record => record.name), ['io']);
    assert.deepEqual(forced.notLoaded, ['signal']);
    assert.deepEqual(forced.overridden, ['control']);
    assert.deepEqual(await env.activator.activeDirectories(), ['/pkgs/control-3.3']);
  });
});
