export { backupPathFor, resolvePristineSource } from './acquire.js';
export type { AcquisitionState, PristineSource } from './acquire.js';
export { convertFile, convertHeaderText, convertInPlace } from './convert.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export type { HeaderLineKind, HeaderLineNode } from './frontend/ast.js';
export { classifyLine, parseHeader } from './frontend/parser.js';
export { decodeLatin1, encodeLatin1, makeSourceFile } from './frontend/source.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, HeaderArtifact, ReportArtifact, ReportJson } from './formats/types.js';
export { nodeFileSystem } from './io/nodeFs.js';
export { compatBlockLines } from './lowering/compat.js';
export { transformHeader } from './lowering/transform.js';
export type {
  ConversionSummary,
  ConvertOptions,
  ConvertResult,
  HeaderFileSystem,
  PipelineDeps,
} from './pipeline.js';
export { buildAddressTable } from './semantics/addressTable.js';
export type { AddressTable } from './semantics/addressTable.js';
