import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { isRecord } from './validation/guards.js';

const PACKAGE_NAME = 'depprobe';

let cachedVersion: string | undefined;

/**
 * Version from the package's own package.json. Works from both the source
 * tree and the build output by walking up from this module.
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const manifest: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (isRecord(manifest) && manifest.name === PACKAGE_NAME && typeof manifest.version === 'string') {
        cachedVersion = manifest.version;
        return cachedVersion;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

export function getToolName(): string {
  return PACKAGE_NAME;
}
