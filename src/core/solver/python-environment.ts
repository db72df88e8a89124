import { join } from 'path';

import type { PythonVersion } from '../../types/index.js';
import { execRunner, type CommandRunner, type RunCommandOptions } from '../../utils/exec.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { parsePipdeptreeOutput, type PipdeptreeEntry } from './pipdeptree.js';

/**
 * The mutable installation the environment probe works on.
 * install() and uninstall() throw CommandError when the tooling fails.
 */
export interface InstallationEnvironment {
  inventory(): Promise<PipdeptreeEntry[]>;
  /** Without an index URL the installer's default index is used */
  install(packageName: string, version: string, indexUrl?: string): Promise<void>;
  uninstall(packageName: string): Promise<void>;
}

export interface PythonEnvironmentOptions {
  /** Directory the virtualenv is created in; replaced by prepare() */
  directory: string;
  pythonVersion: PythonVersion;
  runner?: CommandRunner;
  /** Timeout per command, in milliseconds */
  timeout?: number;
}

/**
 * A virtualenv with pipdeptree installed, driven through pip.
 */
export class PythonEnvironment implements InstallationEnvironment {
  readonly directory: string;
  readonly pythonVersion: PythonVersion;
  private readonly runner: CommandRunner;
  private readonly timeout?: number;

  constructor(options: PythonEnvironmentOptions) {
    this.directory = options.directory;
    this.pythonVersion = options.pythonVersion;
    this.runner = options.runner ?? execRunner;
    this.timeout = options.timeout;
  }

  /**
   * Python executable inside the virtualenv
   */
  get pythonBin(): string {
    return process.platform === 'win32'
      ? join(this.directory, 'Scripts', 'python.exe')
      : join(this.directory, 'bin', `python${this.pythonVersion}`);
  }

  /**
   * Create a fresh virtualenv and install pipdeptree into it.
   */
  async prepare(): Promise<void> {
    await remove(this.directory);
    logger.debug(`Creating virtual environment in ${this.directory} for Python ${this.pythonVersion}`);
    await this.run('virtualenv', ['-p', `python${this.pythonVersion}`, this.directory]);
    await this.run(this.pythonBin, ['-m', 'pip', 'install', 'pipdeptree']);
  }

  async inventory(): Promise<PipdeptreeEntry[]> {
    logger.debug('Obtaining pip dependency tree using pipdeptree');
    const result = await this.run(this.pythonBin, ['-m', 'pipdeptree', '--json'], { json: true });
    return parsePipdeptreeOutput(result.json);
  }

  async install(packageName: string, version: string, indexUrl?: string): Promise<void> {
    logger.debug(`Installing requirement ${packageName} in version ${version}`);
    const args = [
      '-m', 'pip', 'install',
      '--force-reinstall',
      '--no-cache-dir',
      '--no-deps',
      `${packageName}==${version}`
    ];
    if (indexUrl) {
      args.push('--index-url', indexUrl);
    }
    await this.run(this.pythonBin, args);
  }

  async uninstall(packageName: string): Promise<void> {
    logger.debug(`Removing installed package ${packageName}`);
    await this.run(this.pythonBin, ['-m', 'pip', 'uninstall', '--yes', packageName]);
  }

  private run(file: string, args: string[], options: RunCommandOptions = {}) {
    return this.runner.run(file, args, { timeout: this.timeout, ...options });
  }
}
