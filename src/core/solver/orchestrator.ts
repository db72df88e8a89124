import type { PassResult, PythonVersion } from '../../types/index.js';
import { SimpleIndex } from '../index/package-index.js';
import { PythonVersionSolver, type VersionSolver } from '../index/version-solver.js';
import type { OutputPort } from '../ports/output.js';
import { getDefaultEnvironmentDir } from '../directory.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { buildDependencyGraph } from './graph-builder.js';
import { PythonEnvironment, type InstallationEnvironment } from './python-environment.js';
import { VersionResolver } from './version-resolver.js';

export interface EnvironmentSettings {
  directory: string;
  pythonVersion: PythonVersion;
  timeout?: number;
}

export interface ResolveOptions {
  /** Indices to resolve against; one pass runs per index, in this order */
  indexUrls: readonly string[];
  /** 2 or 3 (default: 3); anything else is rejected */
  pythonVersion?: number;
  excludePackages?: Iterable<string>;
  transitive?: boolean;
  /** Where the probe virtualenv lives (default: <tmp>/depprobe/venv) */
  environmentDir?: string;
  /** Timeout per pip/virtualenv command, in milliseconds */
  commandTimeout?: number;
  createSolver?: (indexUrl: string) => VersionSolver;
  /** Must return an environment that is ready for probing */
  createEnvironment?: (indexUrl: string, settings: EnvironmentSettings) => Promise<InstallationEnvironment>;
  /** Progress reporting; silent when omitted */
  output?: OutputPort;
}

export function assertPythonVersion(version: number): asserts version is PythonVersion {
  if (version !== 2 && version !== 3) {
    throw new ValidationError(`Unknown Python version ${version}, expected 2 or 3`);
  }
}

function createDefaultSolver(indexUrl: string): VersionSolver {
  return new PythonVersionSolver(new SimpleIndex(indexUrl));
}

async function createDefaultEnvironment(
  _indexUrl: string,
  settings: EnvironmentSettings
): Promise<InstallationEnvironment> {
  const environment = new PythonEnvironment(settings);
  await environment.prepare();
  return environment;
}

/**
 * Resolve requirements against every configured index.
 *
 * Runs one graph-building pass per index. Each pass installs only from its
 * own index but resolves discovered dependencies against all of them.
 * Passes share no traversal state; they run one after another because they
 * reuse the same environment directory.
 *
 * @returns One PassResult per index, in `indexUrls` order
 */
export async function resolve(requirements: readonly string[], options: ResolveOptions): Promise<PassResult[]> {
  const pythonVersion = options.pythonVersion ?? 3;
  assertPythonVersion(pythonVersion);

  const {
    indexUrls,
    excludePackages = [],
    transitive = true,
    environmentDir = getDefaultEnvironmentDir(),
    commandTimeout,
    createSolver = createDefaultSolver,
    createEnvironment = createDefaultEnvironment,
    output
  } = options;
  const excluded = [...excludePackages];

  const resolvers = indexUrls.map((indexUrl) => new VersionResolver(createSolver(indexUrl)));
  const results: PassResult[] = [];

  for (const resolver of resolvers) {
    const indexUrl = resolver.indexUrl;
    output?.step(`Resolving against ${indexUrl}`);
    logger.info(`Starting resolution pass for index ${indexUrl}`);

    const environment = await createEnvironment(indexUrl, {
      directory: environmentDir,
      pythonVersion,
      timeout: commandTimeout
    });

    const spinner = output?.spinner();
    spinner?.start(`Probing packages from ${indexUrl}`);
    let result: PassResult;
    try {
      result = await buildDependencyGraph({
        requirements,
        resolver,
        allResolvers: resolvers,
        environment,
        excludePackages: excluded,
        transitive,
        onProgress: ({ packageName, version, probed, queued }) => {
          spinner?.message(`Probing ${packageName}==${version} (${probed} probed, ${queued} queued)`);
        }
      });
    } finally {
      spinner?.stop(`Finished ${indexUrl}`);
    }

    results.push(result);
  }

  return results;
}
