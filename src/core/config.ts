import { join } from 'path';
import type { DepprobeConfig } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { isRecord, isStringArray } from '../utils/validation/guards.js';
import { getDepprobeDirectories } from './directory.js';

/**
 * Configuration management for the depprobe CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const CONFIG_KEYS = [
  'indexUrls',
  'pythonVersion',
  'excludePackages',
  'transitive',
  'environmentDir',
  'commandTimeout'
] as const;

export function isConfigKey(key: string): key is keyof DepprobeConfig {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Check a parsed config file against the known shape. Unknown keys are
 * logged and dropped.
 */
export function parseConfig(raw: unknown, source: string): DepprobeConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid configuration in ${source}: expected an object`);
  }

  const config: DepprobeConfig = {};
  const invalid = (key: string, expected: string): ConfigError =>
    new ConfigError(`Invalid configuration in ${source}: '${key}' must be ${expected}`, { key, value: raw[key] });

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      logger.warn(`Ignoring unknown configuration key '${key}'`, { source });
      continue;
    }
    if (value === undefined || value === null) {
      continue;
    }

    switch (key) {
      case 'indexUrls':
      case 'excludePackages':
        if (!isStringArray(value)) throw invalid(key, 'an array of strings');
        config[key] = value;
        break;
      case 'pythonVersion':
        if (value !== 2 && value !== 3) throw invalid(key, '2 or 3');
        config.pythonVersion = value;
        break;
      case 'transitive':
        if (typeof value !== 'boolean') throw invalid(key, 'a boolean');
        config.transitive = value;
        break;
      case 'environmentDir':
        if (typeof value !== 'string' || !value) throw invalid(key, 'a non-empty string');
        config.environmentDir = value;
        break;
      case 'commandTimeout':
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
          throw invalid(key, 'a positive number of milliseconds');
        }
        config.commandTimeout = value;
        break;
    }
  }

  return config;
}

/**
 * Convert a value typed on the command line into a config entry.
 * Lists are comma-separated; an empty string clears list values.
 */
export function parseConfigValue(key: keyof DepprobeConfig, raw: string): DepprobeConfig {
  let value: unknown = raw;
  switch (key) {
    case 'indexUrls':
    case 'excludePackages':
      value = raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
      break;
    case 'pythonVersion':
    case 'commandTimeout':
      value = Number(raw);
      break;
    case 'transitive':
      value = raw === 'true' ? true : raw === 'false' ? false : raw;
      break;
  }
  return parseConfig({ [key]: value }, 'command line');
}

export class ConfigManager {
  private config: DepprobeConfig | null = null;
  private configPath: string | null = null;
  private readonly configDir: string;

  constructor(configDir: string = getDepprobeDirectories().config) {
    this.configDir = configDir;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Get the config path to use for saving.
   * An existing file keeps its format; new configs are JSONC.
   */
  async getConfigFilePath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }
    this.configPath = (await this.findConfigFile()) ?? join(this.configDir, FILE_PATTERNS.CONFIG_JSONC);
    return this.configPath;
  }

  /**
   * Load configuration from file; a missing file yields an empty config
   */
  async load(): Promise<DepprobeConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { error });
    }

    this.configPath = configPath;
    this.config = parseConfig(raw, configPath);
    return this.config;
  }

  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = await this.getConfigFilePath();
    logger.debug(`Saving config to: ${configPath}`);
    try {
      await writeJsoncFile(configPath, this.config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration to ${configPath}`, { error });
    }
  }

  async get<K extends keyof DepprobeConfig>(key: K): Promise<DepprobeConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Merge values into the configuration and write it
   */
  async update(patch: DepprobeConfig): Promise<void> {
    const config = await this.load();
    Object.assign(config, patch);
    await this.save();
    logger.info('Configuration updated', { patch });
  }

  async getAll(): Promise<DepprobeConfig> {
    return { ...(await this.load()) };
  }
}

export const configManager = new ConfigManager();
