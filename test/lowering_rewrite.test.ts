import { describe, expect, it } from 'vitest';

import { classifyLine } from '../src/frontend/parser.js';
import type {
  BitAliasNode,
  ExternalAbsoluteNode,
  PlainRegisterNode,
  WideRegisterNode,
} from '../src/frontend/ast.js';
import {
  formatHex,
  rewriteBitAlias,
  rewriteExternalAbsolute,
  rewritePlainRegister,
  rewriteWideRegister,
  wideAddress,
} from '../src/lowering/rewrite.js';

function wide(text: string): WideRegisterNode {
  const node = classifyLine(text, 1);
  if (node.kind !== 'WideRegister') throw new Error(`unexpected ${node.kind}`);
  return node;
}

function plain(text: string): PlainRegisterNode {
  const node = classifyLine(text, 1);
  if (node.kind !== 'PlainRegister') throw new Error(`unexpected ${node.kind}`);
  return node;
}

function bitAlias(text: string): BitAliasNode {
  const node = classifyLine(text, 1);
  if (node.kind !== 'BitAlias') throw new Error(`unexpected ${node.kind}`);
  return node;
}

function external(text: string): ExternalAbsoluteNode {
  const node = classifyLine(text, 1);
  if (node.kind !== 'ExternalAbsolute') throw new Error(`unexpected ${node.kind}`);
  return node;
}

describe('formatHex', () => {
  it('pads to the requested width in uppercase', () => {
    expect(formatHex(0x9, 2)).toBe('09');
    expect(formatHex(0xab, 2)).toBe('AB');
    expect(formatHex(0x8584, 4)).toBe('8584');
    expect(formatHex(0x1ff, 2)).toBe('1FF');
  });
});

describe('wide registers', () => {
  it('binds the pair to the low byte with the high byte next to it', () => {
    expect(wideAddress(0x84)).toBe(0x8584);
    expect(wideAddress(0x00)).toBe(0x0100);
  });

  it('does not wrap low bytes past the 32-bit range of shift operators', () => {
    expect(wideAddress(0x800000)).toBe(0x80800100);
    expect(wideAddress(0x100)).toBe(0x10100);
    expect(rewriteWideRegister(wide('sfr16 BIG = 0x800000;'))).toBe('__sfr16 __at (0x80800100) BIG;');
  });

  it('emits the SDCC sfr16 form with four hex digits and the trailer', () => {
    const node = wide('sfr16 ROM_ADDR = 0x84;   // flash address');
    expect(rewriteWideRegister(node)).toBe('__sfr16 __at (0x8584) ROM_ADDR;   // flash address');
  });
});

describe('plain registers', () => {
  it('uppercases the address digits and keeps indentation and trailer', () => {
    const node = plain('\tsfr psw = 0xd0; /* PSW */');
    expect(rewritePlainRegister(node)).toBe('\t__sfr __at (0xD0) psw; /* PSW */');
  });

  it('keeps the original digit width', () => {
    const node = plain('sfr ODD = 0x8;');
    expect(rewritePlainRegister(node)).toBe('__sfr __at (0x8) ODD;');
  });
});

describe('bit aliases', () => {
  const table = new Map([
    ['P1', 0x90],
    ['IE', 0xa8],
  ]);

  it('resolves to base + bit as two hex digits', () => {
    const p10 = bitAlias('sbit P1_0 = P1^0;');
    expect(rewriteBitAlias(p10, table)).toBe('__sbit __at (0x90) P1_0;');
    const ea = bitAlias('sbit EA = IE^7;    // global enable');
    expect(rewriteBitAlias(ea, table)).toBe('__sbit __at (0xAF) EA;    // global enable');
  });

  it('returns undefined for an unknown base register', () => {
    const node = bitAlias('sbit TI = SCON^1;');
    expect(rewriteBitAlias(node, table)).toBeUndefined();
  });
});

describe('external absolute declarations', () => {
  it('moves the address in front of the name and keeps type text and trailer', () => {
    const node = external('EXTERN UINT8XV LED_DATA _AT_ 0x2882;');
    expect(rewriteExternalAbsolute(node)).toBe('extern UINT8XV __at (0x2882) LED_DATA;');
  });

  it('uppercases addresses of any width', () => {
    const node = external('EXTERN  UINT16XV  DMA_ADDR  _AT_ 0x2ffc0;  // dma');
    expect(rewriteExternalAbsolute(node)).toBe('extern UINT16XV __at (0x2FFC0) DMA_ADDR;  // dma');
  });
});
