import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigManager, parseConfig, parseConfigValue } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { exists } from '../../src/utils/fs.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'depprobe-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults without writing a file', async () => {
    const manager = new ConfigManager(dir);
    assert.deepEqual(await manager.load(), {});
    assert.equal(await exists(join(dir, 'config.jsonc')), false);
  });

  it('reads JSONC with comments and trailing commas', async () => {
    await writeFile(join(dir, 'config.jsonc'), [
      '{',
      '  // internal mirror first',
      '  "indexUrls": ["https://mirror.test/simple", "https://pypi.org/simple"],',
      '  "pythonVersion": 3,',
      '  "transitive": false,',
      '}'
    ].join('\n'));

    const manager = new ConfigManager(dir);
    assert.deepEqual(await manager.load(), {
      indexUrls: ['https://mirror.test/simple', 'https://pypi.org/simple'],
      pythonVersion: 3,
      transitive: false
    });
    assert.equal(await manager.get('transitive'), false);
  });

  it('falls back to config.json', async () => {
    await writeFile(join(dir, 'config.json'), JSON.stringify({ excludePackages: ['setuptools'] }));
    const manager = new ConfigManager(dir);
    assert.deepEqual(await manager.get('excludePackages'), ['setuptools']);
    assert.equal(await manager.getConfigFilePath(), join(dir, 'config.json'));
  });

  it('rejects files with the wrong shape', async () => {
    await writeFile(join(dir, 'config.jsonc'), '{ "pythonVersion": 4 }');
    await assert.rejects(new ConfigManager(dir).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.message, `Invalid configuration in ${join(dir, 'config.jsonc')}: 'pythonVersion' must be 2 or 3`);
      return true;
    });
  });

  it('rejects files that are not JSON', async () => {
    await writeFile(join(dir, 'config.jsonc'), '{ "indexUrls": [');
    await assert.rejects(new ConfigManager(dir).load(), ConfigError);
  });

  it('writes updates as JSONC', async () => {
    const manager = new ConfigManager(dir);
    await manager.update({ commandTimeout: 1000 });

    const written: unknown = JSON.parse(await readFile(join(dir, 'config.jsonc'), 'utf8'));
    assert.deepEqual(written, { commandTimeout: 1000 });
    assert.deepEqual(await new ConfigManager(dir).getAll(), { commandTimeout: 1000 });
  });
});

describe('parseConfig', () => {
  it('drops unknown keys and null values', () => {
    assert.deepEqual(parseConfig({ telemetry: true, environmentDir: null, transitive: true }, 'test'), { transitive: true });
  });

  it('rejects non-objects', () => {
    assert.throws(() => parseConfig([], 'test'), { message: 'Invalid configuration in test: expected an object' });
  });
});

describe('parseConfigValue', () => {
  it('converts command line values', () => {
    assert.deepEqual(parseConfigValue('indexUrls', 'https://a.test/simple, https://b.test/simple'), {
      indexUrls: ['https://a.test/simple', 'https://b.test/simple']
    });
    assert.deepEqual(parseConfigValue('pythonVersion', '2'), { pythonVersion: 2 });
    assert.deepEqual(parseConfigValue('transitive', 'false'), { transitive: false });
    assert.deepEqual(parseConfigValue('environmentDir', '/tmp/venv'), { environmentDir: '/tmp/venv' });
  });

  it('validates converted values', () => {
    assert.throws(() => parseConfigValue('commandTimeout', 'soon'), {
      message: "Invalid configuration in command line: 'commandTimeout' must be a positive number of milliseconds"
    });
    assert.throws(() => parseConfigValue('transitive', 'yes'), ConfigError);
  });
});
