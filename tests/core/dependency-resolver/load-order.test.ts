import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { resolveLoadOrder } from '../../../src/core/dependency-resolver/index.js';
import {
  CyclicDependencyError,
  PackageNotFoundError,
  UnsatisfiedDependencyError
} from '../../../src/utils/errors.js';
import { makeRecord, makeSet } from '../../test-helpers.js';

const names = (records: Array<{ name: string }>) => records.map(record => record.name);

describe('resolveLoadOrder', () => {
  it('puts dependencies before dependents in declaration order', () => {
    const installed = makeSet(
      makeRecord('signal', '1.4', ['control', 'io']),
      makeRecord('control', '3.3', ['io']),
      makeRecord('io', '2.0')
    );
    assert.deepEqual(names(resolveLoadOrder('signal', installed)), ['io', 'control', 'signal']);
  });

  it('lists a shared dependency once', () => {
    const installed = makeSet(
      makeRecord('app', '1', ['left', 'right']),
      makeRecord('left', '1', ['base']),
      makeRecord('right', '1', ['base']),
      makeRecord('base', '1')
    );
    assert.deepEqual(names(resolveLoadOrder('app', installed)), ['base', 'left', 'right', 'app']);
  });

  it('reports the cycle path', () => {
    const installed = makeSet(
      makeRecord('a', '1', ['b']),
      makeRecord('b', '1', ['c']),
      makeRecord('c', '1', ['a'])
    );
    assert.throws(() => resolveLoadOrder('a', installed), (error: unknown) => {
      assert.ok(error instanceof CyclicDependencyError);
      assert.deepEqual(error.cycle, ['a', 'b', 'c', 'a']);
      assert.equal(error.message, 'Circular dependency detected: a -> b -> c -> a');
      return true;
    });
  });

  it('rejects a package that depends on itself', () => {
    const installed = makeSet(makeRecord('io', '2.0', ['io']));
    assert.throws(() => resolveLoadOrder('io', installed), (error: unknown) => {
      assert.ok(error instanceof CyclicDependencyError);
      assert.deepEqual(error.cycle, ['io', 'io']);
      return true;
    });
  });

  it('returns the same sequence on every run', () => {
    const installed = makeSet(
      makeRecord('app', '1', ['right', 'left', 'base']),
      makeRecord('left', '1', ['base']),
      makeRecord('right', '1', ['extra', 'base']),
      makeRecord('extra', '1'),
      makeRecord('base', '1')
    );
    const first = names(resolveLoadOrder('app', installed));
    assert.deepEqual(first, ['extra', 'base', 'right', 'left', 'app']);
    assert.deepEqual(names(resolveLoadOrder('app', installed)), first);
  });

  it('gathers every unsatisfied dependency', () => {
    const installed = makeSet(
      makeRecord('signal', '1.4', ['control >= 4', 'io']),
      makeRecord('control', '3.3')
    );
    assert.throws(() => resolveLoadOrder('signal', installed), (error: unknown) => {
      assert.ok(error instanceof UnsatisfiedDependencyError);
      assert.deepEqual(error.missingNames, ['control', 'io']);
      assert.equal(error.message, 'Unsatisfied dependencies:\n  signal needs control >= 4 (installed: 3.3)\n  signal needs io (not installed)');
      return true;
    });
  });

  it('skips missing dependencies with allowMissing and reports each one', () => {
    const warnings: string[] = [];
    const installed = makeSet(
      makeRecord('signal', '1.4', ['control >= 4', 'io']),
      makeRecord('control', '3.3')
    );
    const order = resolveLoadOrder('signal', installed, { allowMissing: true, onWarning: w => warnings.push(w) });
    assert.deepEqual(names(order), ['control', 'signal']);
    assert.deepEqual(warnings, [
      'signal: ignoring unsatisfied dependency control >= 4',
      'signal: ignoring unsatisfied dependency io'
    ]);
  });

  it('throws PackageNotFoundError for an unknown target', () => {
    assert.throws(() => resolveLoadOrder('ghost', makeSet()), PackageNotFoundError);
  });
});
