import { encodeLatin1 } from '../frontend/source.js';
import type { HeaderArtifact, WriteHeaderOptions } from './types.js';

/**
 * First banner line. Its presence marks a file as converter output.
 */
export const CONVERTED_MARKER = '// SDCC-CONVERTED HEADER (auto-generated)';

/**
 * Banner naming the file to edit. The header is latin-1, so characters above U+00FF in the name become `?`.
 */
export function bannerLines(source: string): string[] {
  const name = source.replace(/[^\u0000-\u00ff]/g, '?');
  return [
    CONVERTED_MARKER,
    '// DO NOT EDIT THIS FILE DIRECTLY.',
    `// Edit ${name} and re-run the converter instead.`,
    '',
  ];
}

export function isConvertedHeader(text: string): boolean {
  return text.includes(CONVERTED_MARKER);
}

/**
 * Join transformed lines into the final header text, terminating every line (the last one included).
 */
export function writeHeader(lines: readonly string[], opts?: WriteHeaderOptions): HeaderArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const all = opts?.bannerSource !== undefined ? [...bannerLines(opts.bannerSource), ...lines] : lines;
  const text = all.length > 0 ? all.join(lineEnding) + lineEnding : '';
  return { kind: 'header', text, bytes: encodeLatin1(text) };
}
