import { MEMORY_CLASS_ALIASES } from './compat.js';

const BIT_WORD_RE = /\bbit\b/g;
const TYPEDEF_RE = /^\s*typedef\b/;

/**
 * Rewrite the standalone word `bit` to `__bit`. Lines that start with `//` are left alone.
 */
export function rewriteBitKeyword(text: string): string {
  if (text.trimStart().startsWith('//')) return text;
  return text.replace(BIT_WORD_RE, '__bit');
}

/**
 * Remove memory-class qualifiers from a `typedef`, e.g.
 * `typedef unsigned char  xdata  UINT8X; // x` -> `typedef unsigned char UINT8X; // x`.
 *
 * Only the code before the first `//` is touched; its whitespace is collapsed to single spaces.
 */
export function stripTypedefQualifiers(text: string): string {
  if (!TYPEDEF_RE.test(text)) return text;

  const stripped = text.trimStart();
  const indent = text.slice(0, text.length - stripped.length);
  const commentAt = stripped.indexOf('//');
  let code = commentAt >= 0 ? stripped.slice(0, commentAt) : stripped;
  let comment = commentAt >= 0 ? stripped.slice(commentAt) : '';

  const before = code;
  for (const [keyword] of MEMORY_CLASS_ALIASES) {
    code = code.replace(new RegExp(`\\b${keyword}\\b`, 'g'), '');
  }
  if (code === before) return text;

  code = code.replace(/\s+/g, ' ').trimEnd();
  if (comment.length > 0) comment = ` ${comment}`;
  return `${indent}${code}${comment}`;
}
