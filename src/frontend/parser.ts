import type { HeaderLineNode } from './ast.js';
import type { SourceFile } from './source.js';

/** Default anchor: the first include guard of the vendor header (`#ifndef __BASE_TYPE__`). */
export const DEFAULT_ANCHOR_PREFIX = '#ifndef';

// `;` is mandatory in every form; a line missing it stays unclassified.
const WIDE_REGISTER_RE = /^(\s*)sfr16\s+(\w+)\s*=\s*0x([0-9A-Fa-f]+);(.*)$/;
const PLAIN_REGISTER_RE = /^(\s*)sfr\s+(\w+)\s*=\s*0x([0-9A-Fa-f]+);(.*)$/;
const BIT_ALIAS_RE = /^(\s*)sbit\s+(\w+)\s*=\s*(\w+)\s*\^\s*([0-7]);(.*)$/;
const EXTERNAL_ABSOLUTE_RE = /^(\s*)EXTERN\s+(.+?)\s+(\w+)\s+_AT_\s+0x([0-9A-Fa-f]+);(.*)$/;

/**
 * Classify a single header line. Precedence is fixed, first match wins:
 * anchor, wide register, plain register, bit alias, external absolute, unclassified.
 */
export function classifyLine(
  text: string,
  line: number,
  anchorPrefix: string = DEFAULT_ANCHOR_PREFIX,
): HeaderLineNode {
  if (anchorPrefix.length > 0 && text.startsWith(anchorPrefix)) {
    return { kind: 'Anchor', line, text };
  }

  const wide = WIDE_REGISTER_RE.exec(text);
  if (wide) {
    const [, indent = '', name = '', digits = '', trailer = ''] = wide;
    return {
      kind: 'WideRegister',
      line,
      text,
      indent,
      name,
      address: parseInt(digits, 16),
      trailer,
    };
  }

  const plain = PLAIN_REGISTER_RE.exec(text);
  if (plain) {
    const [, indent = '', name = '', digits = '', trailer = ''] = plain;
    return {
      kind: 'PlainRegister',
      line,
      text,
      indent,
      name,
      addressDigits: digits,
      address: parseInt(digits, 16),
      trailer,
    };
  }

  const bit = BIT_ALIAS_RE.exec(text);
  if (bit) {
    const [, indent = '', name = '', base = '', bitIndex = '0', trailer = ''] = bit;
    return {
      kind: 'BitAlias',
      line,
      text,
      indent,
      name,
      base,
      bit: Number(bitIndex),
      trailer,
    };
  }

  const ext = EXTERNAL_ABSOLUTE_RE.exec(text);
  if (ext) {
    const [, indent = '', typeText = '', name = '', digits = '', trailer = ''] = ext;
    return {
      kind: 'ExternalAbsolute',
      line,
      text,
      indent,
      typeText,
      name,
      addressDigits: digits,
      trailer,
    };
  }

  return { kind: 'Unclassified', line, text };
}

/**
 * Classify every line of a decoded header, in file order.
 *
 * Only the first line matching the anchor prefix becomes an `Anchor`; later matches go through the
 * declaration rules like any other line.
 */
export function parseHeader(
  file: SourceFile,
  anchorPrefix: string = DEFAULT_ANCHOR_PREFIX,
): HeaderLineNode[] {
  let anchorPending = true;
  return file.lines.map((text, i) => {
    const node = classifyLine(text, i + 1, anchorPending ? anchorPrefix : '');
    if (node.kind === 'Anchor') anchorPending = false;
    return node;
  });
}
