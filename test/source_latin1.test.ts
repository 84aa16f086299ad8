import { describe, expect, it } from 'vitest';

import { decodeLatin1, encodeLatin1, makeSourceFile, splitLines } from '../src/frontend/source.js';

describe('latin-1 source handling', () => {
  it('round-trips every byte value', () => {
    const bytes = new Uint8Array(256);
    for (let i = 0; i < 256; i++) bytes[i] = i;
    const text = decodeLatin1(bytes);
    expect(text.length).toBe(256);
    expect(Array.from(encodeLatin1(text))).toEqual(Array.from(bytes));
  });

  it('decodes high bytes one character per byte', () => {
    const text = decodeLatin1(new Uint8Array([0x2f, 0x2f, 0x20, 0xb5, 0xe9]));
    expect(text).toBe('// µé');
  });
});

describe('splitLines', () => {
  it('drops the empty element after a trailing terminator', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('splits on CRLF, LF and lone CR', () => {
    expect(splitLines('a\r\nb\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('keeps interior blank lines and yields nothing for empty text', () => {
    expect(splitLines('a\n\n\nb\n')).toEqual(['a', '', '', 'b']);
    expect(splitLines('')).toEqual([]);
  });

  it('does not split on NEL (0x85), which is a printable byte in vendor comments', () => {
    expect(splitLines('// a\u0085b\n')).toEqual(['// a\u0085b']);
  });
});

describe('makeSourceFile', () => {
  it('detects the line ending from the first line break', () => {
    expect(makeSourceFile('a.h', 'x\r\ny\r\n').lineEnding).toBe('\r\n');
    expect(makeSourceFile('a.h', 'x\ny\r\n').lineEnding).toBe('\n');
    expect(makeSourceFile('a.h', 'no break').lineEnding).toBe('\n');
  });
});
