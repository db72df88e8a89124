import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { SimpleIndex } from '../../../src/core/index/package-index.js';
import { PythonVersionSolver } from '../../../src/core/index/version-solver.js';
import { resolve, type EnvironmentSettings } from '../../../src/core/solver/orchestrator.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { HttpClient } from '../../../src/utils/http-client.js';
import { createRecordingOutput, FakeEnvironment, FakeSource } from '../../test-helpers.js';

const INDEX_A = 'https://a.test/simple';
const INDEX_B = 'https://b.test/simple';

const sources: Record<string, FakeSource> = {
  [INDEX_A]: new FakeSource(INDEX_A, { versions: { foo: ['1.0'] } }),
  [INDEX_B]: new FakeSource(INDEX_B, { versions: { foo: ['1.0', '2.0'] } })
};

function createSolver(indexUrl: string): PythonVersionSolver {
  const source = sources[indexUrl];
  assert.ok(source, `unexpected index ${indexUrl}`);
  return new PythonVersionSolver(source);
}

describe('resolve', () => {
  it('returns one pass per index in configuration order', async () => {
    const settings: Array<[string, EnvironmentSettings]> = [];
    const result = await resolve(['foo>=1.0'], {
      indexUrls: [INDEX_B, INDEX_A],
      environmentDir: '/tmp/depprobe-test-venv',
      commandTimeout: 5000,
      createSolver,
      createEnvironment: async (indexUrl, environmentSettings) => {
        settings.push([indexUrl, environmentSettings]);
        return new FakeEnvironment();
      }
    });

    assert.equal(result.length, 2);
    assert.deepEqual(result[0].tree.map((entry) => [entry.index_url, entry.package_version]), [
      [INDEX_B, '2.0'],
      [INDEX_B, '1.0']
    ]);
    assert.deepEqual(result[1].tree.map((entry) => [entry.index_url, entry.package_version]), [[INDEX_A, '1.0']]);
    assert.deepEqual(settings, [
      [INDEX_B, { directory: '/tmp/depprobe-test-venv', pythonVersion: 3, timeout: 5000 }],
      [INDEX_A, { directory: '/tmp/depprobe-test-venv', pythonVersion: 3, timeout: 5000 }]
    ]);
  });

  it('reports index URLs exactly as configured', async () => {
    const configured = 'https://c.test/simple/';
    const http = new HttpClient({ fetch: async () => new Response(null, { status: 404 }) });
    const [pass] = await resolve(['foo==9'], {
      indexUrls: [configured],
      createSolver: (indexUrl) => new PythonVersionSolver(new SimpleIndex(indexUrl, { http })),
      createEnvironment: async () => new FakeEnvironment()
    });

    assert.deepEqual(pass.unresolved, [{ package_name: 'foo', version_spec: '==9', index: configured }]);
  });

  it('reports progress through the output port', async () => {
    const lines: string[] = [];
    await resolve(['foo==1.0'], {
      indexUrls: [INDEX_A],
      pythonVersion: 2,
      createSolver,
      createEnvironment: async () => new FakeEnvironment(),
      output: createRecordingOutput(lines)
    });

    assert.deepEqual(lines, [
      `step: Resolving against ${INDEX_A}`,
      `spinner start: Probing packages from ${INDEX_A}`,
      'spinner: Probing foo==1.0 (1 probed, 0 queued)',
      `spinner stop: Finished ${INDEX_A}`
    ]);
  });

  it('returns no passes without indices', async () => {
    assert.deepEqual(await resolve(['foo'], { indexUrls: [], createSolver }), []);
  });

  it('rejects unknown Python versions', async () => {
    await assert.rejects(resolve(['foo'], { indexUrls: [INDEX_A], pythonVersion: 4, createSolver }), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, 'Validation error: Unknown Python version 4, expected 2 or 3');
      return true;
    });
  });
});
