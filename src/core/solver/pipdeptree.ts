/**
 * Reading `pipdeptree --json` output.
 *
 * Each element describes one installed distribution and its declared
 * requirements:
 *   { "package": { "key", "package_name", "installed_version" },
 *     "dependencies": [{ "key", "package_name", "installed_version", "required_version" }] }
 */

import { ANY_VERSION_MARKERS } from '../../constants/index.js';
import { isSamePackage } from '../../utils/package-name.js';
import { isRecord, optionalString } from '../../utils/validation/guards.js';

export interface PipdeptreePackage {
  key: string;
  package_name: string;
  installed_version: string;
}

export interface PipdeptreeDependency {
  key: string;
  package_name: string;
  /** Missing or "Any" when the requirement carries no version range */
  required_version: string | null;
  installed_version?: string;
}

export interface PipdeptreeEntry {
  package: PipdeptreePackage;
  dependencies: PipdeptreeDependency[];
}

function parsePackage(value: unknown): PipdeptreePackage | null {
  if (!isRecord(value)) return null;
  const packageName = optionalString(value, 'package_name');
  const installedVersion = optionalString(value, 'installed_version');
  if (!packageName || installedVersion === undefined) return null;
  return {
    key: optionalString(value, 'key') ?? packageName.toLowerCase(),
    package_name: packageName,
    installed_version: installedVersion
  };
}

function parseDependency(value: unknown): PipdeptreeDependency | null {
  if (!isRecord(value)) return null;
  const packageName = optionalString(value, 'package_name');
  if (!packageName) return null;
  return {
    key: optionalString(value, 'key') ?? packageName.toLowerCase(),
    package_name: packageName,
    required_version: optionalString(value, 'required_version') ?? null,
    installed_version: optionalString(value, 'installed_version')
  };
}

/**
 * Validate parsed pipdeptree JSON. Malformed elements are dropped.
 */
export function parsePipdeptreeOutput(output: unknown): PipdeptreeEntry[] {
  if (!Array.isArray(output)) {
    throw new Error('pipdeptree output is not a JSON array');
  }

  const entries: PipdeptreeEntry[] = [];
  for (const item of output) {
    if (!isRecord(item)) continue;
    const pkg = parsePackage(item.package);
    if (!pkg) continue;
    const dependencies = Array.isArray(item.dependencies)
      ? item.dependencies
          .map(parseDependency)
          .filter((dependency): dependency is PipdeptreeDependency => dependency !== null)
      : [];
    entries.push({ package: pkg, dependencies });
  }
  return entries;
}

/**
 * Find the inventory entry of a package. Some pipdeptree releases ignore
 * `--packages`, so the lookup always happens here.
 */
export function findInventoryEntry(entries: readonly PipdeptreeEntry[], packageName: string): PipdeptreeEntry | undefined {
  return entries.find((entry) => isSamePackage(entry.package.key, packageName));
}

/**
 * Map pipdeptree's "no constraint" spellings to the empty range.
 */
export function normalizeRequiredVersion(requiredVersion: string | null | undefined): string {
  if (!requiredVersion) {
    return '';
  }
  const trimmed = requiredVersion.trim();
  return ANY_VERSION_MARKERS.some((marker) => marker === trimmed) ? '' : trimmed;
}
