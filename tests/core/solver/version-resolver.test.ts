import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { PackageSource } from '../../../src/core/index/package-index.js';
import type { VersionSolver } from '../../../src/core/index/version-solver.js';
import { VersionResolver } from '../../../src/core/solver/version-resolver.js';
import { createResolver, FakeSource } from '../../test-helpers.js';

describe('VersionResolver', () => {
  const resolver = createResolver('https://index.test/simple', {
    versions: { foo: ['1.0', '1.5', '2.0'] }
  });

  it('exposes the index URL of its solver', () => {
    assert.equal(resolver.indexUrl, 'https://index.test/simple');
    assert.equal(resolver.source.url, 'https://index.test/simple');
  });

  it('resolves a range to every matching version', async () => {
    assert.deepEqual(await resolver.resolve('foo', '>=1.0,<2.0'), ['1.0', '1.5']);
    assert.deepEqual(await resolver.resolve('foo', ''), ['1.0', '1.5', '2.0']);
  });

  it('returns an empty list for unknown packages', async () => {
    assert.deepEqual(await resolver.resolve('missing', '>=1.0'), []);
  });

  it('returns an empty list when the solver fails', async () => {
    const source: PackageSource = new FakeSource('https://index.test/simple', { versions: {} });
    const failing: VersionSolver = {
      source,
      solve: async () => {
        throw new Error('index unreachable');
      }
    };
    assert.deepEqual(await new VersionResolver(failing).resolve('foo', ''), []);
  });

  it('rejects solutions with more than one package', async () => {
    const source: PackageSource = new FakeSource('https://index.test/simple', { versions: {} });
    const odd: VersionSolver = {
      source,
      solve: async () => new Map([['foo', ['1.0']], ['bar', ['2.0']]])
    };
    assert.deepEqual(await new VersionResolver(odd).resolve('foo', ''), []);
  });
});
