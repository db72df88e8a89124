/**
 * @fileoverview Pipeline behind `depprobe solve`.
 *
 * Collects requirements, merges CLI flags over the config file, runs every
 * resolution pass and writes the report.
 */

import { resolve as resolvePath } from 'path';
import type { CommandResult, DepprobeConfig, ReportFormat } from '../../types/index.js';
import { DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_INDEX_URL, DEFAULT_PYTHON_VERSION } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { readRequirementsFile } from '../../utils/requirements-file.js';
import type { ConfigManager } from '../config.js';
import type { OutputPort } from '../ports/output.js';
import { buildReport, serializeReport, summarizeResult, type Report } from '../report.js';
import { assertPythonVersion, resolve, type ResolveOptions } from '../solver/orchestrator.js';

export interface SolveCommandOptions {
  requirements?: string;
  index?: string[];
  pythonVersion?: number;
  exclude?: string[];
  /** Undefined when neither the flag nor its negation was given */
  transitive?: boolean;
  venv?: string;
  output?: string;
  format?: ReportFormat;
}

export interface SolvePipelineDeps {
  config: ConfigManager;
  output: OutputPort;
  /** Receives the serialized report when no output file is given */
  writeStdout?: (text: string) => void;
  createSolver?: ResolveOptions['createSolver'];
  createEnvironment?: ResolveOptions['createEnvironment'];
}

export interface SolveSettings {
  indexUrls: string[];
  pythonVersion: number;
  excludePackages: string[];
  transitive: boolean;
  environmentDir?: string;
  commandTimeout: number;
}

/**
 * Flags win over config values, config values over built-in defaults.
 */
export function mergeSettings(options: SolveCommandOptions, config: DepprobeConfig): SolveSettings {
  const indexUrls = options.index?.length ? options.index : config.indexUrls?.length ? config.indexUrls : [DEFAULT_INDEX_URL];
  const pythonVersion = options.pythonVersion ?? config.pythonVersion ?? DEFAULT_PYTHON_VERSION;
  assertPythonVersion(pythonVersion);

  const environmentDir = options.venv ?? config.environmentDir;

  return {
    indexUrls: [...indexUrls],
    pythonVersion,
    excludePackages: [...(options.exclude ?? config.excludePackages ?? [])],
    transitive: options.transitive ?? config.transitive ?? true,
    environmentDir: environmentDir ? resolvePath(environmentDir) : undefined,
    commandTimeout: config.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT_MS
  };
}

export async function collectRequirements(args: readonly string[], requirementsFile?: string): Promise<string[]> {
  const requirements = [...args];
  if (requirementsFile) {
    requirements.push(...(await readRequirementsFile(requirementsFile)));
  }
  if (requirements.length === 0) {
    throw new ValidationError('No requirements given; pass them as arguments or with --requirements <file>');
  }
  return requirements;
}

export async function runSolvePipeline(
  args: readonly string[],
  options: SolveCommandOptions,
  deps: SolvePipelineDeps
): Promise<CommandResult<Report>> {
  const { output } = deps;
  const requirements = await collectRequirements(args, options.requirements);
  const settings = mergeSettings(options, await deps.config.load());
  logger.debug('Starting solve pipeline', { requirements, settings });

  const startedAt = new Date();
  const result = await resolve(requirements, {
    ...settings,
    createSolver: deps.createSolver,
    createEnvironment: deps.createEnvironment,
    output
  });
  const finishedAt = new Date();

  const report = buildReport(result, { ...settings, startedAt, finishedAt });
  const text = serializeReport(report, options.format ?? 'json');

  if (options.output) {
    await writeTextFile(options.output, text);
    output.success(`Report written to ${options.output}`);
  } else {
    (deps.writeStdout ?? ((chunk: string) => process.stdout.write(chunk)))(text);
  }

  output.note(summarizeResult(settings.indexUrls, result).join('\n'), 'Summary');

  const warnings = result.flatMap((pass, i) =>
    pass.errors.length > 0 ? [`${pass.errors.length} packages failed on ${settings.indexUrls[i]}`] : []
  );
  for (const warning of warnings) {
    output.warn(warning);
  }

  return { success: true, data: report, warnings };
}
