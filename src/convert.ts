import { basename } from 'node:path';

import { readHeaderText, resolvePristineSource } from './acquire.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import { parseHeader } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import { isConvertedHeader } from './formats/writeHeader.js';
import { transformHeader } from './lowering/transform.js';
import type { ConvertOptions, ConvertResult, PipelineDeps } from './pipeline.js';
import type { DuplicateRegister } from './semantics/addressTable.js';
import { buildAddressTable } from './semantics/addressTable.js';

/**
 * Convert decoded header text. Pure: no file access, output returned as artifacts.
 *
 * A text that already carries the converted-header marker is still converted, with an `HDR003` warning;
 * in-place runs refuse such a file earlier, in {@link resolvePristineSource}.
 */
export function convertHeaderText(
  path: string,
  text: string,
  options: ConvertOptions = {},
  formats: FormatWriters = defaultFormatWriters,
): ConvertResult {
  const diagnostics: Diagnostic[] = [];
  if (isConvertedHeader(text)) {
    diagnostics.push({
      id: DiagnosticIds.AlreadyConverted,
      severity: 'warning',
      message: 'Input already carries the converted-header marker; convert the vendor original instead.',
      file: path,
    });
  }

  const file = makeSourceFile(path, text);
  const lines = parseHeader(file, options.anchorPrefix);
  const duplicates: DuplicateRegister[] = [];
  const table = buildAddressTable(lines, path, diagnostics, duplicates);
  const { lines: out, summary } = transformHeader(
    lines,
    table,
    path,
    options,
    diagnostics,
    duplicates,
  );

  const artifacts: Artifact[] = [
    formats.writeHeader(out, {
      lineEnding: options.lineEnding ?? file.lineEnding,
      ...(options.banner ? { bannerSource: basename(path) } : {}),
    }),
  ];
  if (options.emitReport && formats.writeReport) {
    artifacts.push(formats.writeReport(path, summary));
  }

  return { source: path, diagnostics, artifacts, summary };
}

function withOutputPath(artifacts: Artifact[], output: string): Artifact[] {
  return artifacts.map((a) => {
    if (a.kind === 'header') return { ...a, path: output };
    return { ...a, json: { ...a.json, output } };
  });
}

/**
 * Explicit mode: convert `input` for writing to `output`. The input is only read.
 */
export async function convertFile(
  input: string,
  output: string,
  options: ConvertOptions,
  deps: PipelineDeps,
): Promise<ConvertResult> {
  const diagnostics: Diagnostic[] = [];
  const text = await readHeaderText(deps.fs, input, diagnostics);
  if (text === undefined) return { source: input, diagnostics, artifacts: [] };

  const res = convertHeaderText(input, text, options, deps.formats);
  return { ...res, artifacts: withOutputPath(res.artifacts, output) };
}

/**
 * In-place mode: regenerate `primary` from its pristine backup, creating the backup on the first run.
 *
 * The banner is always written so a later first run can recognise the primary as converted output.
 */
export async function convertInPlace(
  primary: string,
  options: ConvertOptions,
  deps: PipelineDeps,
): Promise<ConvertResult> {
  const diagnostics: Diagnostic[] = [];
  const pristine = await resolvePristineSource(primary, deps.fs, diagnostics);
  if (!pristine || hasErrors(diagnostics)) return { source: primary, diagnostics, artifacts: [] };

  const text = await readHeaderText(deps.fs, pristine.backup, diagnostics);
  if (text === undefined) return { source: pristine.backup, diagnostics, artifacts: [] };

  const res = convertHeaderText(pristine.backup, text, { ...options, banner: true }, deps.formats);
  return {
    ...res,
    diagnostics: [...diagnostics, ...res.diagnostics],
    artifacts: withOutputPath(res.artifacts, primary),
  };
}
