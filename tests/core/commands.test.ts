import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'fs/promises';
import { join } from 'path';

import { executeCommand, hasFailures } from '../../src/core/commands.js';
import { reportCommandResult } from '../../src/core/command-reporting.js';
import { ConfigManager } from '../../src/core/config.js';
import { ValidationError } from '../../src/utils/errors.js';
import { formatPathForDisplay } from '../../src/utils/formatters.js';
import {
  FailingToolchain,
  RecordingOutput,
  createTestEnvironment,
  removeTempDir,
  writePackageSource,
  type TestEnvironment
} from '../test-helpers.js';

describe('executeCommand', () => {
  let env: TestEnvironment | undefined;

  afterEach(async () => {
    if (env) await removeTempDir(env.root);
    env = undefined;
  });

  const configFor = (root: string) => new ConfigManager({
    config: join(root, 'config'),
    data: join(root, 'config'),
    runtime: join(root, 'tmp')
  });

  it('flags a partially failed install', async () => {
    env = await createTestEnvironment({ collaborators: { toolchain: new FailingToolchain(new Set(['signal'])) } });
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    const signal = await writePackageSource(env.sources, { name: 'signal', version: '1.4' });

    const ok = await executeCommand({ kind: 'install', sources: [io], options: {} }, env.ctx, configFor(env.root));
    assert.equal(hasFailures(ok), false);

    const partial = await executeCommand({ kind: 'install', sources: [signal], options: {} }, env.ctx, configFor(env.root));
    assert.equal(hasFailures(partial), true);
  });

  it('builds binary packages and reports each archive', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    const buildDir = join(env.root, 'binaries');

    const result = await executeCommand({ kind: 'build', buildDir, sources: [io], noDeps: false }, env.ctx);
    assert.equal(hasFailures(result), false);

    const output = new RecordingOutput();
    reportCommandResult(result, output);
    assert.deepEqual(output.lines, ['success: Built io 2.0', `info:    ${formatPathForDisplay(join(buildDir, 'io-2.0.tar.gz'))}`]);
  });

  it('loads and lists through the same context', async () => {
    env = await createTestEnvironment();
    const io = await writePackageSource(env.sources, { name: 'io', version: '2.0' });
    await executeCommand({ kind: 'install', sources: [io], options: {} }, env.ctx);
    await executeCommand({ kind: 'load', names: ['io'], noDeps: false }, env.ctx);

    const result = await executeCommand({ kind: 'list', names: [], forge: false }, env.ctx);

    assert.equal(result.kind, 'list');
    if (result.kind === 'list') {
      assert.deepEqual(result.installed.map(report => `${report.record.name} ${report.loaded}`), ['io true']);
    }
  });

  it('lists the package index with forge', async () => {
    env = await createTestEnvironment({ latest: { io: '2.0' } });
    const result = await executeCommand({ kind: 'list', names: [], forge: true }, env.ctx);
    assert.deepEqual(result, { kind: 'list-remote', names: ['io'] });
  });

  it('rejects rebuild with both --local and --global', async () => {
    env = await createTestEnvironment();
    await assert.rejects(
      executeCommand({ kind: 'rebuild', names: [], preferLocal: true, preferGlobal: true }, env.ctx),
      ValidationError
    );
  });

  it('stores a new local prefix and uses it for the rest of the command', async () => {
    env = await createTestEnvironment();
    const config = configFor(env.root);
    const prefix = join(env.root, 'custom');

    const result = await executeCommand({ kind: 'prefix', prefix, global: false }, env.ctx, config);

    assert.deepEqual(result, { kind: 'prefix', settings: { scope: 'local', prefix, archPrefix: prefix } });
    assert.equal(env.ctx.installPaths.prefix, prefix);
    assert.equal(env.ctx.installPaths.archPrefix, prefix);
    const saved: unknown = JSON.parse(await readFile(join(env.root, 'config', 'config.jsonc'), 'utf8'));
    assert.deepEqual(saved, { prefix, archPrefix: prefix });

    const output = new RecordingOutput();
    reportCommandResult(result, output);
    assert.deepEqual(output.lines, [
      `Installation prefix (local): ${prefix}`,
      `Architecture dependent prefix (local): ${prefix}`
    ]);
  });

  it('shows the global prefixes without changing them', async () => {
    env = await createTestEnvironment();
    const result = await executeCommand({ kind: 'prefix', global: true }, env.ctx, configFor(env.root));
    assert.deepEqual(result, {
      kind: 'prefix',
      settings: {
        scope: 'global',
        prefix: env.ctx.installPaths.globalPrefix,
        archPrefix: env.ctx.installPaths.globalArchPrefix
      }
    });
  });

  it('points the global registry at another file', async () => {
    env = await createTestEnvironment();
    const file = join(env.root, 'elsewhere.yml');

    const result = await executeCommand({ kind: 'global-list', file }, env.ctx, configFor(env.root));

    assert.deepEqual(result, { kind: 'registry-path', scope: 'global', path: file });
    assert.equal(env.ctx.registryPaths.global, file);
    assert.equal(await configFor(env.root).get('globalList'), file);
  });
});
