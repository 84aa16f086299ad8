import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { HeaderLineNode, PlainRegisterNode } from '../frontend/ast.js';
import { formatHex } from '../lowering/rewrite.js';

/**
 * Register name -> byte address, built from every `sfr` line of one file.
 *
 * `sfr16` pairs are not entered: a 16-bit pair has no single bit-addressable byte.
 */
export type AddressTable = ReadonlyMap<string, number>;

/**
 * A register name declared more than once. `kept` is the address the table ends up with.
 */
export interface DuplicateRegister {
  name: string;
  line: number;
  previousLine: number;
  previous: number;
  kept: number;
}

/**
 * Scan the whole file once and collect plain register addresses.
 *
 * Bit aliases may reference a register declared further down, so the table must be complete before any
 * `sbit` is resolved. When a name repeats, the last declaration wins and a warning is pushed.
 */
export function buildAddressTable(
  lines: readonly HeaderLineNode[],
  file: string,
  diagnostics: Diagnostic[],
  duplicates: DuplicateRegister[] = [],
): AddressTable {
  const table = new Map<string, number>();
  const declaredAt = new Map<string, PlainRegisterNode>();

  for (const node of lines) {
    if (node.kind !== 'PlainRegister') continue;

    const prior = declaredAt.get(node.name);
    if (prior) {
      duplicates.push({
        name: node.name,
        line: node.line,
        previousLine: prior.line,
        previous: prior.address,
        kept: node.address,
      });
      diagnostics.push({
        id: DiagnosticIds.DuplicateRegister,
        severity: 'warning',
        message: `Register "${node.name}" redeclared at 0x${formatHex(node.address, 2)} (previously 0x${formatHex(prior.address, 2)} on line ${prior.line}); the last declaration wins.`,
        file,
        line: node.line,
        column: 1,
      });
    }

    declaredAt.set(node.name, node);
    table.set(node.name, node.address);
  }

  return table;
}
