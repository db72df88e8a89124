import * as os from 'os';
import * as path from 'path';
import type { DepprobeDirectories } from '../types/index.js';
import { DEPPROBE_DIRS, DIR_PATTERNS } from '../constants/index.js';

/**
 * Get depprobe directories using the dotfile convention (~/.depprobe)
 */
export function getDepprobeDirectories(homeDir: string = os.homedir()): DepprobeDirectories {
  const depprobeDir = path.join(homeDir, DIR_PATTERNS.DEPPROBE);

  return {
    config: depprobeDir,
    runtime: path.join(os.tmpdir(), 'depprobe')
  };
}

/**
 * Default location of the probe virtualenv
 */
export function getDefaultEnvironmentDir(): string {
  return path.join(getDepprobeDirectories().runtime, DEPPROBE_DIRS.VENV);
}
