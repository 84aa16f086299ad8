export type LineEnding = '\n' | '\r\n';

/**
 * Decoded header file, split into physical lines (without their terminators).
 */
export interface SourceFile {
  path: string;
  text: string;
  lines: string[];
  /** Terminator of the first line break in `text`; `\n` when the file has none. */
  lineEnding: LineEnding;
}

/**
 * Decode raw bytes as latin-1: one character per byte, so every value 0..255 survives a round trip.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/**
 * Inverse of {@link decodeLatin1}. Characters above U+00FF cannot occur in decoded text and are truncated.
 */
export function encodeLatin1(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'latin1'));
}

function detectLineEnding(text: string): LineEnding {
  const lf = text.indexOf('\n');
  if (lf > 0 && text[lf - 1] === '\r') return '\r\n';
  return '\n';
}

/**
 * Split text on `\r\n`, `\n` or `\r`. A trailing terminator does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (/[\r\n]$/.test(text)) lines.pop();
  return lines;
}

/**
 * Build a {@link SourceFile} from a path and decoded text.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  return { path, text, lines: splitLines(text), lineEnding: detectLineEnding(text) };
}
