import type { Diagnostic } from './diagnostics/types.js';
import type { HeaderLineKind } from './frontend/ast.js';
import type { LineEnding } from './frontend/source.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { DuplicateRegister } from './semantics/addressTable.js';

/**
 * Options that influence the conversion and which artifacts are produced.
 */
export interface ConvertOptions {
  /** Line prefix that marks where the compatibility block goes (default `#ifndef`). */
  anchorPrefix?: string;
  /** Prepend the converted-header banner. Always on in in-place mode. */
  banner?: boolean;
  /** Rewrite the standalone word `bit` to `__bit` on unclassified lines. */
  bitKeyword?: boolean;
  /** Drop memory-class qualifiers from `typedef` lines. */
  stripTypedefQualifiers?: boolean;
  /** Force the output line ending; by default the input's is kept. */
  lineEnding?: LineEnding;
  /** Produce the JSON conversion report artifact. */
  emitReport?: boolean;
}

/**
 * A `sbit` line left as written because its base register is unknown.
 */
export interface UnresolvedBitAlias {
  line: number;
  name: string;
  base: string;
}

/**
 * What the transform pass did, for the CLI summary and the JSON report.
 */
export interface ConversionSummary {
  counts: Record<HeaderLineKind, number>;
  unresolved: UnresolvedBitAlias[];
  duplicates: DuplicateRegister[];
  compatBlockInserted: boolean;
}

/**
 * Result of a conversion run: diagnostics plus any produced artifacts.
 *
 * `artifacts` is empty when an error diagnostic prevented conversion.
 */
export interface ConvertResult {
  /** Path the pristine text was read from. */
  source: string;
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  summary?: ConversionSummary;
}

/**
 * File access needed by the pipeline. Paths are passed through as given.
 */
export interface HeaderFileSystem {
  exists(path: string): Promise<boolean>;
  readBytes(path: string): Promise<Uint8Array>;
  writeBytes(path: string, bytes: Uint8Array): Promise<void>;
  rename(from: string, to: string): Promise<void>;
}

/**
 * Dependency injection surface for the conversion pipeline.
 */
export interface PipelineDeps {
  fs: HeaderFileSystem;
  formats: FormatWriters;
}
