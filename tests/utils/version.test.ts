import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { compareVersions, isValidVersion, parseVersion } from '../../src/utils/version.js';
import { InvalidVersionError } from '../../src/utils/errors.js';

describe('compareVersions', () => {
  it('compares segments numerically from the left', () => {
    assert.equal(compareVersions('1.2.3', '1.2.3'), 'EQUAL');
    assert.equal(compareVersions('1.10', '1.9'), 'GREATER');
    assert.equal(compareVersions('0.9.9', '1.0.0'), 'LESS');
    assert.equal(compareVersions('2.0', '1.99.99'), 'GREATER');
  });

  it('treats a strict prefix as older', () => {
    assert.equal(compareVersions('1.2', '1.2.0'), 'LESS');
    assert.equal(compareVersions('1.2.0', '1.2'), 'GREATER');
  });

  it('keeps segments beyond double precision distinct', () => {
    assert.equal(compareVersions('1.9007199254740993', '1.9007199254740992'), 'GREATER');
    assert.equal(compareVersions('1.18446744073709551616', '1.18446744073709551617'), 'LESS');
    assert.equal(compareVersions('007.1', '7.1'), 'EQUAL');
  });

  it('rejects non-numeric segments', () => {
    assert.throws(() => compareVersions('1.2a', '1.2'), InvalidVersionError);
    assert.throws(() => compareVersions('1.2', '1..2'), InvalidVersionError);
    assert.throws(() => compareVersions('', '1'), InvalidVersionError);
  });

  it('is antisymmetric', () => {
    const pairs: Array<[string, string]> = [['1.0', '1.0.1'], ['3.3.1', '3.3'], ['4', '4']];
    for (const [a, b] of pairs) {
      const forward = compareVersions(a, b);
      const backward = compareVersions(b, a);
      const mirrored = forward === 'LESS' ? 'GREATER' : forward === 'GREATER' ? 'LESS' : 'EQUAL';
      assert.equal(backward, mirrored);
    }
  });
});

describe('version helpers', () => {
  it('parses segments', () => {
    assert.deepEqual(parseVersion('10.0.3'), [10n, 0n, 3n]);
  });

  it('validates', () => {
    assert.equal(isValidVersion('1.2.3'), true);
    assert.equal(isValidVersion('-1'), false);
    assert.equal(isValidVersion('1.2-beta'), false);
  });
});
