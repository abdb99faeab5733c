import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { findUnsatisfiedDependencies, resolveInstallOrder } from '../../../src/core/dependency-resolver/index.js';
import { CyclicDependencyError, UnresolvableRequestError } from '../../../src/utils/errors.js';
import { parseDependencySpec } from '../../../src/utils/dependency-spec.js';
import { makeRecord, makeSet } from '../../test-helpers.js';

const candidate = (name: string, version: string, deps: string[] = []) => ({
  name,
  version,
  dependencies: deps.map(parseDependencySpec)
});

describe('resolveInstallOrder', () => {
  it('installs requested dependencies first and keeps request order otherwise', () => {
    const order = resolveInstallOrder(
      [candidate('signal', '1.4', ['control']), candidate('io', '2.0'), candidate('control', '3.3')],
      makeSet()
    );
    assert.deepEqual(order, ['control', 'signal', 'io']);
  });

  it('leaves out exact versions that are already installed', () => {
    const order = resolveInstallOrder(
      [candidate('io', '2.0'), candidate('control', '3.3')],
      makeSet(makeRecord('io', '2.0'), makeRecord('control', '3.2'))
    );
    assert.deepEqual(order, ['control']);
  });

  it('rejects a request whose packages depend on each other', () => {
    assert.throws(
      () => resolveInstallOrder([candidate('a', '1', ['b']), candidate('b', '1', ['a'])], makeSet()),
      (error: unknown) => {
        assert.ok(error instanceof UnresolvableRequestError);
        assert.deepEqual(error.cycle, ['a', 'b', 'a']);
        return true;
      }
    );
  });

  it('rejects a requested package that depends on itself', () => {
    assert.throws(
      () => resolveInstallOrder([candidate('io', '2.0', ['io'])], makeSet()),
      (error: unknown) => {
        assert.ok(error instanceof CyclicDependencyError);
        assert.deepEqual(error.cycle, ['io', 'io']);
        return true;
      }
    );
  });
});

describe('findUnsatisfiedDependencies', () => {
  it('reports missing and too-old dependencies', () => {
    const installed = makeSet(makeRecord('control', '3.2'), makeRecord('io', '2.0'));
    assert.deepEqual(findUnsatisfiedDependencies(candidate('signal', '1.4', ['control >= 3.3', 'io', 'fft']), installed), [
      { dependent: 'signal', dependency: 'control', requirement: 'control >= 3.3', installedVersion: '3.2' },
      { dependent: 'signal', dependency: 'fft', requirement: 'fft' }
    ]);
  });
});
