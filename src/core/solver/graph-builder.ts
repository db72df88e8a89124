import type { PackageKey, PassResult, Requirement } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { toInstalledPackage } from './entry.js';
import { EnvironmentProbe } from './environment-probe.js';
import type { InstallationEnvironment } from './python-environment.js';
import { formatVersionSpec, parseRequirement } from './requirement-parser.js';
import type { VersionResolver } from './version-resolver.js';

export interface ProbeProgress {
  packageName: string;
  version: string;
  /** Packages probed so far in this pass, including this one */
  probed: number;
  /** Packages still waiting in the queue */
  queued: number;
}

export interface GraphBuilderOptions {
  requirements: readonly string[];
  /** Resolver of the index packages are installed from in this pass */
  resolver: VersionResolver;
  /** Resolvers of every configured index, in configuration order */
  allResolvers: readonly VersionResolver[];
  environment: InstallationEnvironment;
  /** Names never used as seeds; dependencies are not affected */
  excludePackages?: Iterable<string>;
  /** Probe discovered dependencies too (default: true) */
  transitive?: boolean;
  onProgress?: (progress: ProbeProgress) => void;
}

/**
 * Visited-set key; spelling variants of one project name share a key.
 */
export function packageKeyId(packageName: string, version: string): string {
  return `${normalizePackageName(packageName)}==${version}`;
}

/**
 * Build the dependency graph for one index.
 *
 * Seeds a work queue from the requirements, then installs every queued
 * (name, version) into the probe environment to learn its real dependencies.
 * Each dependency is resolved against all indices, and the versions found
 * anywhere are queued when transitive. The queue is LIFO so the most recently
 * discovered packages are probed first. A (name, version) is probed at most
 * once per pass no matter how many parents reach it.
 *
 * Per-package failures are collected in the result; they never stop the pass.
 */
export async function buildDependencyGraph(options: GraphBuilderOptions): Promise<PassResult> {
  const { requirements, resolver, allResolvers, environment, transitive = true, onProgress } = options;
  const indexUrl = resolver.indexUrl;
  const excluded = new Set([...(options.excludePackages ?? [])].map(normalizePackageName));
  const probe = new EnvironmentProbe(environment);

  const result: PassResult = { tree: [], errors: [], unparsed: [], unresolved: [], environment: [] };
  const seen = new Set<string>();
  const queue: PackageKey[] = [];

  const enqueue = (name: string, version: string): void => {
    const id = packageKeyId(name, version);
    if (!seen.has(id)) {
      seen.add(id);
      queue.push({ name, version });
    }
  };

  // 1. Seed the queue
  for (const raw of requirements) {
    logger.debug(`Parsing requirement ${raw}`);
    let requirement: Requirement;
    try {
      requirement = parseRequirement(raw);
    } catch (error) {
      result.unparsed.push({ requirement: raw, details: error instanceof Error ? error.message : String(error) });
      continue;
    }

    if (excluded.has(normalizePackageName(requirement.name))) {
      logger.debug(`Skipping excluded package ${requirement.name}`);
      continue;
    }

    const versionSpec = formatVersionSpec(requirement.spec);
    const versions = await resolver.resolve(requirement.name, versionSpec);
    if (versions.length === 0) {
      logger.warn(`No versions were resolved for dependency ${requirement.name} in version '${versionSpec}'`);
      result.unresolved.push({ package_name: requirement.name, version_spec: versionSpec, index: indexUrl });
      continue;
    }

    for (const version of versions) {
      enqueue(requirement.name, version);
    }
  }

  // 2. Baseline of the environment before anything gets installed
  try {
    result.environment = (await environment.inventory()).map(toInstalledPackage);
  } catch (error) {
    logger.error('Failed to capture the environment before probing', error);
  }

  // 3. Drain the queue
  let probed = 0;
  let key: PackageKey | undefined;
  while ((key = queue.pop()) !== undefined) {
    probed++;
    logger.info(`Using index ${indexUrl} to discover package ${key.name} in version ${key.version}`);
    onProgress?.({ packageName: key.name, version: key.version, probed, queued: queue.length });

    const outcome = await probe.probe(key.name, key.version, resolver.source);
    if (outcome.kind !== 'installed') {
      result.errors.push(outcome.error);
      continue;
    }

    const entry = outcome.entry;
    result.tree.push(entry);

    for (const dependency of entry.dependencies) {
      for (const dependencyResolver of allResolvers) {
        logger.info(
          `Resolving dependency versions for ${dependency.package_name} with range ` +
          `'${dependency.required_version}' from ${dependencyResolver.indexUrl}`
        );
        const versions = await dependencyResolver.resolve(dependency.package_name, dependency.required_version);
        logger.debug(`Resolved versions for package ${dependency.package_name}: ${versions.join(', ')}`);
        dependency.resolved_versions.push({ index_url: dependencyResolver.indexUrl, versions });

        if (!transitive) continue;

        // The visited-set ignores which index produced a version
        for (const version of versions) {
          enqueue(dependency.package_name, version);
        }
      }
    }
  }

  return result;
}
