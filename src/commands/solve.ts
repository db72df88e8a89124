import { Command, InvalidArgumentError, Option } from 'commander';
import type { ReportFormat } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { configManager } from '../core/config.js';
import { createCliOutput } from '../cli/context.js';
import { runSolvePipeline, type SolveCommandOptions } from '../core/solve/solve-pipeline.js';

const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'yaml'];

interface RawSolveOptions extends Omit<SolveCommandOptions, 'format'> {
  format?: string;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function toReportFormat(value: string | undefined): ReportFormat | undefined {
  return REPORT_FORMATS.find((format) => format === value);
}

/**
 * Setup the 'depprobe solve' command
 */
export function setupSolveCommand(program: Command): void {
  program
    .command('solve')
    .argument('[requirements...]', 'requirements such as "requests>=2.0"')
    .description('Install every matching release and record its dependencies')
    .option('-r, --requirements <file>', 'read requirements from a file')
    .option('-i, --index <url...>', 'package index URLs, in priority order')
    .option('--python-version <n>', 'Python major version of the probe environment (2 or 3)', parseInteger)
    .option('-e, --exclude <name...>', 'packages that are never probed')
    .option('--transitive', 'also probe discovered dependencies (default)')
    .option('--no-transitive', 'only probe the given requirements')
    .option('--venv <dir>', 'directory of the probe virtualenv')
    .option('-o, --output <file>', 'write the report to a file instead of stdout')
    .addOption(new Option('--format <format>', 'report format').choices(REPORT_FORMATS))
    .action(
      withErrorHandling(async (requirements: string[], options: RawSolveOptions, command: Command) => {
        const transitiveSource = command.getOptionValueSource('transitive');
        const output = createCliOutput({ reportOnStdout: !options.output });

        await runSolvePipeline(
          requirements,
          {
            ...options,
            transitive: transitiveSource === 'cli' ? options.transitive : undefined,
            format: toReportFormat(options.format)
          },
          { config: configManager, output }
        );
      })
    );
}
