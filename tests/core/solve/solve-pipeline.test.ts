import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve as resolvePath } from 'node:path';

import { ConfigManager } from '../../../src/core/config.js';
import { PythonVersionSolver } from '../../../src/core/index/version-solver.js';
import {
  collectRequirements,
  mergeSettings,
  runSolvePipeline,
  type SolvePipelineDeps
} from '../../../src/core/solve/solve-pipeline.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createRecordingOutput, FakeEnvironment, FakeSource } from '../../test-helpers.js';

const INDEX = 'https://a.test/simple';

describe('mergeSettings', () => {
  it('falls back to built-in defaults', () => {
    assert.deepEqual(mergeSettings({}, {}), {
      indexUrls: ['https://pypi.org/simple'],
      pythonVersion: 3,
      excludePackages: [],
      transitive: true,
      environmentDir: undefined,
      commandTimeout: 600000
    });
  });

  it('lets flags win over the config file', () => {
    const settings = mergeSettings(
      { index: [INDEX], pythonVersion: 2, transitive: false, venv: 'probe-venv' },
      { indexUrls: ['https://other.test/simple'], pythonVersion: 3, transitive: true, excludePackages: ['pip'], commandTimeout: 10 }
    );
    assert.deepEqual(settings, {
      indexUrls: [INDEX],
      pythonVersion: 2,
      excludePackages: ['pip'],
      transitive: false,
      environmentDir: resolvePath('probe-venv'),
      commandTimeout: 10
    });
  });

  it('rejects unknown Python versions', () => {
    assert.throws(() => mergeSettings({ pythonVersion: 4 }, {}), ValidationError);
  });
});

describe('runSolvePipeline', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'depprobe-solve-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function deps(lines: string[], stdout: string[]): SolvePipelineDeps {
    return {
      config: new ConfigManager(join(dir, 'config')),
      output: createRecordingOutput(lines),
      writeStdout: (text) => stdout.push(text),
      createSolver: (indexUrl) => new PythonVersionSolver(new FakeSource(indexUrl, { versions: { foo: ['1.0'], bar: ['2.0'] } })),
      createEnvironment: async () => new FakeEnvironment({ failInstall: ['bar==2.0'] })
    };
  }

  it('requires at least one requirement', async () => {
    await assert.rejects(collectRequirements([]), {
      message: 'Validation error: No requirements given; pass them as arguments or with --requirements <file>'
    });
  });

  it('prints the JSON report and a summary', async () => {
    const requirementsFile = join(dir, 'requirements.txt');
    await writeFile(requirementsFile, '# seeds\nbar==2.0\n');
    const lines: string[] = [];
    const stdout: string[] = [];

    const result = await runSolvePipeline(['foo==1.0'], { requirements: requirementsFile, index: [INDEX] }, deps(lines, stdout));

    assert.equal(result.success, true);
    assert.deepEqual(result.warnings, [`1 packages failed on ${INDEX}`]);
    assert.equal(stdout.length, 1);

    const report: unknown = JSON.parse(stdout[0]);
    assert.deepEqual(report, result.data);
    assert.deepEqual(result.data?.result[0].tree.map((entry) => entry.package_name), ['foo']);
    assert.deepEqual(result.data?.result[0].errors.map((error) => error.package_name), ['bar']);
    assert.deepEqual(lines.slice(-2), [
      `note Summary: ${INDEX}: 1 entries, 1 errors, 0 unresolved, 0 unparsed`,
      `warn: 1 packages failed on ${INDEX}`
    ]);
  });

  it('writes YAML reports to a file', async () => {
    const outputFile = join(dir, 'out', 'report.yaml');
    const lines: string[] = [];
    const stdout: string[] = [];

    await runSolvePipeline(['foo==1.0'], { index: [INDEX], output: outputFile, format: 'yaml' }, deps(lines, stdout));

    assert.deepEqual(stdout, []);
    assert.ok((await readFile(outputFile, 'utf8')).startsWith('metadata:\n  tool: depprobe\n'));
    assert.ok(lines.includes(`success: Report written to ${outputFile}`));
  });
});
