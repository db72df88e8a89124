import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { PythonVersionSolver } from '../../../src/core/index/version-solver.js';
import { PackageNotFoundError, RequirementParseError } from '../../../src/utils/errors.js';
import { FakeSource } from '../../test-helpers.js';

const source = new FakeSource('https://index.test/simple', {
  versions: {
    foo: ['0.9', '1.0', '1.5', '2.0', '2.1b1'],
    bar: ['1.0']
  }
});

describe('PythonVersionSolver', () => {
  it('returns only the highest match by default', async () => {
    const solver = new PythonVersionSolver(source);
    const solution = await solver.solve(['foo>=1.0', 'bar']);
    assert.deepEqual([...solution], [['foo', ['2.0']], ['bar', ['1.0']]]);
  });

  it('returns every match with allVersions', async () => {
    const solver = new PythonVersionSolver(source);
    const solution = await solver.solve(['foo>=1.0,<2.0'], { allVersions: true });
    assert.deepEqual(solution.get('foo'), ['1.0', '1.5']);
  });

  it('intersects requirements on the same project', async () => {
    const solver = new PythonVersionSolver(source);
    const solution = await solver.solve(['foo>=1.0', 'foo<2.0'], { allVersions: true });
    assert.deepEqual(solution.get('foo'), ['1.0', '1.5']);
  });

  it('maps a known project without matches to an empty list', async () => {
    const solver = new PythonVersionSolver(source);
    const solution = await solver.solve(['foo==9.9.9'], { allVersions: true });
    assert.deepEqual(solution.get('foo'), []);
  });

  it('propagates unknown projects and bad requirements', async () => {
    const solver = new PythonVersionSolver(source);
    await assert.rejects(solver.solve(['missing']), PackageNotFoundError);
    await assert.rejects(solver.solve(['foo>>1']), RequirementParseError);
  });
});
