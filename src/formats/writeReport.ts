import type { ConversionSummary } from '../pipeline.js';
import type { ReportArtifact, WriteReportOptions } from './types.js';

/**
 * Create the JSON conversion report. Unresolved and duplicate entries are listed in line order.
 */
export function writeReport(
  source: string,
  summary: ConversionSummary,
  opts?: WriteReportOptions,
): ReportArtifact {
  return {
    kind: 'report',
    json: {
      format: 'c51-sdcc-header-report',
      version: 1,
      source,
      ...(opts?.output !== undefined ? { output: opts.output } : {}),
      counts: { ...summary.counts },
      unresolved: [...summary.unresolved].sort((a, b) => a.line - b.line),
      duplicates: [...summary.duplicates].sort((a, b) => a.line - b.line),
      compatBlockInserted: summary.compatBlockInserted,
    },
  };
}
