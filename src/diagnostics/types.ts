/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A conversion diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so build scripts can grep for them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `HDR001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * `HDR0xx` cover file acquisition, `HDR2xx` cover individual declaration lines.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'HDR000',

  /** Input header could not be found or read. */
  MissingInputFile: 'HDR001',

  /** Output (or report) could not be written. */
  IoWriteFailed: 'HDR002',

  /** Input already carries the converted-header marker. */
  AlreadyConverted: 'HDR003',

  /** First in-place run: the vendor header was moved aside as the pristine backup. */
  BackupCreated: 'HDR010',

  /** `sbit` references a register that no `sfr` line declares; the line is passed through. */
  UnresolvedBaseRegister: 'HDR200',

  /** The same `sfr` name is declared more than once; the last declaration wins. */
  DuplicateRegister: 'HDR201',

  /** Register address does not fit the single-byte SFR space. */
  AddressOutOfRange: 'HDR202',

  /** No anchor line was found, so the compatibility block was not inserted. */
  AnchorNotFound: 'HDR203',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
