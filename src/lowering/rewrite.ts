import type {
  BitAliasNode,
  ExternalAbsoluteNode,
  PlainRegisterNode,
  WideRegisterNode,
} from '../frontend/ast.js';
import type { AddressTable } from '../semantics/addressTable.js';

/**
 * Uppercase hex, zero-padded to at least `width` digits.
 */
export function formatHex(n: number, width: number): string {
  return n.toString(16).toUpperCase().padStart(width, '0');
}

/**
 * Combined address of a register pair: high byte at `low + 1`, low byte at `low`.
 *
 * Computed on bigints: 32-bit `<<`/`|` would wrap for low bytes past 0x7FFFFF.
 */
export function wideAddress(low: number): number {
  return Number((BigInt(low + 1) << 8n) | BigInt(low));
}

/** `sfr16 NAME = 0xLL;` -> `__sfr16 __at (0xHHLL) NAME;` */
export function rewriteWideRegister(node: WideRegisterNode): string {
  return `${node.indent}__sfr16 __at (0x${formatHex(wideAddress(node.address), 4)}) ${node.name};${node.trailer}`;
}

/** `sfr NAME = 0xHH;` -> `__sfr __at (0xHH) NAME;`, keeping the digit width. */
export function rewritePlainRegister(node: PlainRegisterNode): string {
  return `${node.indent}__sfr __at (0x${node.addressDigits.toUpperCase()}) ${node.name};${node.trailer}`;
}

/**
 * `sbit NAME = REG^b;` -> `__sbit __at (0xXX) NAME;`.
 *
 * Returns `undefined` when `REG` is not in the table; the caller keeps the line as written.
 */
export function rewriteBitAlias(node: BitAliasNode, table: AddressTable): string | undefined {
  const base = table.get(node.base);
  if (base === undefined) return undefined;
  return `${node.indent}__sbit __at (0x${formatHex(base + node.bit, 2)}) ${node.name};${node.trailer}`;
}

/** `EXTERN T NAME _AT_ 0xADDR;` -> `extern T __at (0xADDR) NAME;` */
export function rewriteExternalAbsolute(node: ExternalAbsoluteNode): string {
  return `${node.indent}extern ${node.typeText} __at (0x${node.addressDigits.toUpperCase()}) ${node.name};${node.trailer}`;
}
