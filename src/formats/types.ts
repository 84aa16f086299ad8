import type { LineEnding } from '../frontend/source.js';
import type { ConversionSummary } from '../pipeline.js';

/**
 * Options for header writing.
 */
export interface WriteHeaderOptions {
  /**
   * Line ending to use between (and after) lines.
   */
  lineEnding?: LineEnding;
  /**
   * When set, the converted-header banner is prepended and names this file as the one to edit.
   */
  bannerSource?: string;
}

/**
 * Options for report writing.
 */
export interface WriteReportOptions {
  /** Path of the header the report describes. */
  output?: string;
}

/**
 * In-memory converted header. `bytes` is the latin-1 encoding of `text`.
 */
export interface HeaderArtifact {
  kind: 'header';
  path?: string;
  text: string;
  bytes: Uint8Array;
}

/**
 * In-memory conversion report artifact.
 */
export interface ReportArtifact {
  kind: 'report';
  path?: string;
  json: ReportJson;
}

/**
 * Union of all artifact kinds produced by the converter.
 */
export type Artifact = HeaderArtifact | ReportArtifact;

/**
 * JSON shape of `--report` output.
 */
export type ReportJson = {
  format: 'c51-sdcc-header-report';
  version: 1;
  source: string;
  output?: string;
  counts: ConversionSummary['counts'];
  unresolved: ConversionSummary['unresolved'];
  duplicates: ConversionSummary['duplicates'];
  compatBlockInserted: boolean;
};

/**
 * Format writers used by the pipeline to turn transformed lines into artifacts.
 */
export interface FormatWriters {
  writeHeader(lines: readonly string[], opts?: WriteHeaderOptions): HeaderArtifact;
  writeReport?(source: string, summary: ConversionSummary, opts?: WriteReportOptions): ReportArtifact;
}
