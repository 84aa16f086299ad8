import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { parseHeader } from '../src/frontend/parser.js';
import { makeSourceFile } from '../src/frontend/source.js';
import { compatBlockLines } from '../src/lowering/compat.js';
import { transformHeader } from '../src/lowering/transform.js';
import type { ConvertOptions } from '../src/pipeline.js';
import { buildAddressTable } from '../src/semantics/addressTable.js';

const COMPAT = [
  '',
  '#ifdef __SDCC__',
  '#define data  __data',
  '#define idata __idata',
  '#define xdata __xdata',
  '#define pdata __pdata',
  '#define code  __code',
  '#endif',
  '',
];

function run(
  source: string[],
  options: Pick<ConvertOptions, 'bitKeyword' | 'stripTypedefQualifiers'> = {},
) {
  const diagnostics: Diagnostic[] = [];
  const lines = parseHeader(makeSourceFile('t.h', source.join('\n')));
  const table = buildAddressTable(lines, 't.h', diagnostics);
  const res = transformHeader(lines, table, 't.h', options, diagnostics);
  return { ...res, diagnostics };
}

describe('compatBlockLines', () => {
  it('aliases every memory class under the SDCC guard', () => {
    expect(compatBlockLines()).toEqual(COMPAT);
  });
});

describe('transformHeader', () => {
  it('rewrites declarations in order and inserts the compatibility block once', () => {
    const { lines, summary, diagnostics } = run([
      '#ifndef GUARD',
      'sfr16 DPTR = 0x82;',
      'sbit RS0 = PSW^3;',
      'sfr PSW = 0xD0;',
      '#ifndef OTHER',
      'sbit TI = SCON^1; // serial',
      'sfr BIG = 0x1ff;',
    ]);

    expect(lines).toEqual([
      '#ifndef GUARD',
      ...COMPAT,
      '__sfr16 __at (0x8382) DPTR;',
      '__sbit __at (0xD3) RS0;',
      '__sfr __at (0xD0) PSW;',
      '#ifndef OTHER',
      'sbit TI = SCON^1; // serial',
      '__sfr __at (0x1FF) BIG;',
    ]);
    expect(summary.counts).toEqual({
      Anchor: 1,
      WideRegister: 1,
      PlainRegister: 2,
      BitAlias: 2,
      ExternalAbsolute: 0,
      Unclassified: 1,
    });
    expect(summary.unresolved).toEqual([{ line: 6, name: 'TI', base: 'SCON' }]);
    expect(summary.compatBlockInserted).toBe(true);
    expect(diagnostics.map((d) => [d.id, d.line])).toEqual([
      [DiagnosticIds.UnresolvedBaseRegister, 6],
      [DiagnosticIds.AddressOutOfRange, 7],
    ]);
    expect(diagnostics[1]?.message).toBe('sfr "BIG" address 0x1FF does not fit in one byte.');
  });

  it('warns when an sfr16 low byte leaves no room for the high byte', () => {
    const { lines, diagnostics } = run(['#ifndef G', 'sfr16 TOP = 0xFF;']);
    expect(lines[lines.length - 1]).toBe('__sfr16 __at (0x100FF) TOP;');
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.AddressOutOfRange]);
  });

  it('reports a missing anchor as info and inserts nothing', () => {
    const { lines, summary, diagnostics } = run(['sfr P0 = 0x80;']);
    expect(lines).toEqual(['__sfr __at (0x80) P0;']);
    expect(summary.compatBlockInserted).toBe(false);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.AnchorNotFound,
        severity: 'info',
        message: 'No anchor line found; memory-class compatibility block not inserted.',
        file: 't.h',
      },
    ]);
  });

  it('passes unclassified lines through untouched by default', () => {
    const source = [
      '#ifndef G',
      '/* comment with sfr P0 = 0x80; inside */',
      '#define BIT_MASK 0x01',
      'typedef unsigned char  xdata  UINT8X;',
      'typedef bit BOOL;',
      '',
      'sfr P0 = 0x80',
    ];
    const { lines } = run(source);
    expect(lines.slice(COMPAT.length + 1)).toEqual(source.slice(1));
  });

  it('applies the opt-in keyword passes to unclassified lines only', () => {
    const { lines } = run(
      [
        '#ifndef G',
        'typedef unsigned char  xdata   UINT8X;  //x',
        'typedef bit BOOL;',
        '// bit flags',
        'sbit bit0 = P0^0;',
        '#ifndef bit',
      ],
      { bitKeyword: true, stripTypedefQualifiers: true },
    );
    expect(lines.slice(COMPAT.length + 1)).toEqual([
      'typedef unsigned char UINT8X; //x',
      'typedef __bit BOOL;',
      '// bit flags',
      'sbit bit0 = P0^0;',
      '#ifndef __bit',
    ]);
  });
});
