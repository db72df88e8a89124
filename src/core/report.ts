import yaml from 'js-yaml';
import type { PassResult, ReportFormat } from '../types/index.js';
import { getToolName, getVersion } from '../utils/package.js';

export interface ReportMetadata {
  tool: string;
  version: string;
  python_version: number;
  index_urls: string[];
  transitive: boolean;
  exclude_packages: string[];
  started_at: string;
  finished_at: string;
}

export interface Report {
  metadata: ReportMetadata;
  /** One entry per index, in index order */
  result: PassResult[];
}

export interface ReportInput {
  pythonVersion: number;
  indexUrls: readonly string[];
  transitive: boolean;
  excludePackages: readonly string[];
  startedAt: Date;
  finishedAt: Date;
}

export function buildReport(result: PassResult[], input: ReportInput): Report {
  return {
    metadata: {
      tool: getToolName(),
      version: getVersion(),
      python_version: input.pythonVersion,
      index_urls: [...input.indexUrls],
      transitive: input.transitive,
      exclude_packages: [...input.excludePackages],
      started_at: input.startedAt.toISOString(),
      finished_at: input.finishedAt.toISOString()
    },
    result
  };
}

export function serializeReport(report: Report, format: ReportFormat): string {
  if (format === 'yaml') {
    return yaml.dump(report, { noRefs: true, lineWidth: -1 });
  }
  return JSON.stringify(report, null, 2) + '\n';
}

/**
 * One line per index: `<url>: 3 entries, 1 errors, 0 unresolved, 0 unparsed`
 */
export function summarizeResult(indexUrls: readonly string[], result: readonly PassResult[]): string[] {
  return result.map((pass, i) => {
    const url = indexUrls[i] ?? `index #${i + 1}`;
    return `${url}: ${pass.tree.length} entries, ${pass.errors.length} errors, ` +
      `${pass.unresolved.length} unresolved, ${pass.unparsed.length} unparsed`;
  });
}
