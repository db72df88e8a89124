import type { DependencyEntry, InstalledPackage } from '../../types/index.js';
import type { PackageHash } from '../index/package-index.js';
import { normalizeRequiredVersion, type PipdeptreeEntry } from './pipdeptree.js';

/**
 * Reduce a pipdeptree element to the package and its declared requirements.
 */
export function toInstalledPackage(entry: PipdeptreeEntry): InstalledPackage {
  return {
    package_name: entry.package.package_name,
    package_version: entry.package.installed_version,
    dependencies: entry.dependencies.map((dependency) => ({
      package_name: dependency.package_name,
      required_version: normalizeRequiredVersion(dependency.required_version)
    }))
  };
}

/**
 * Build the tree entry for a probed package. resolved_versions start empty
 * and are filled by the graph builder.
 */
export function createDependencyEntry(
  entry: PipdeptreeEntry,
  indexUrl: string,
  hashes: readonly PackageHash[]
): DependencyEntry {
  const installed = toInstalledPackage(entry);
  return {
    package_name: installed.package_name,
    package_version: installed.package_version,
    index_url: indexUrl,
    sha256: hashes.map((hash) => hash.sha256),
    dependencies: installed.dependencies.map((dependency) => ({
      ...dependency,
      resolved_versions: []
    }))
  };
}
