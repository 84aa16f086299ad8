import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { HeaderLineKind, HeaderLineNode } from '../frontend/ast.js';
import type { ConversionSummary, ConvertOptions } from '../pipeline.js';
import type { AddressTable, DuplicateRegister } from '../semantics/addressTable.js';
import { compatBlockLines } from './compat.js';
import { rewriteBitKeyword, stripTypedefQualifiers } from './keywords.js';
import {
  formatHex,
  rewriteBitAlias,
  rewriteExternalAbsolute,
  rewritePlainRegister,
  rewriteWideRegister,
} from './rewrite.js';

export interface TransformResult {
  lines: string[];
  summary: ConversionSummary;
}

function emptyCounts(): Record<HeaderLineKind, number> {
  return {
    Anchor: 0,
    WideRegister: 0,
    PlainRegister: 0,
    BitAlias: 0,
    ExternalAbsolute: 0,
    Unclassified: 0,
  };
}

function rangeWarning(
  diagnostics: Diagnostic[],
  file: string,
  node: HeaderLineNode,
  message: string,
): void {
  diagnostics.push({
    id: DiagnosticIds.AddressOutOfRange,
    severity: 'warning',
    message,
    file,
    line: node.line,
    column: 1,
  });
}

/**
 * Second pass: rewrite classified lines using the address table.
 *
 * Lines come out in input order. The compatibility block follows the first anchor line only; unresolved
 * `sbit` lines are kept verbatim and reported.
 */
export function transformHeader(
  lines: readonly HeaderLineNode[],
  table: AddressTable,
  file: string,
  options: Pick<ConvertOptions, 'bitKeyword' | 'stripTypedefQualifiers'>,
  diagnostics: Diagnostic[],
  duplicates: DuplicateRegister[] = [],
): TransformResult {
  const out: string[] = [];
  const counts = emptyCounts();
  const summary: ConversionSummary = {
    counts,
    unresolved: [],
    duplicates,
    compatBlockInserted: false,
  };

  for (const node of lines) {
    counts[node.kind] += 1;

    switch (node.kind) {
      case 'Anchor':
        out.push(node.text);
        if (!summary.compatBlockInserted) {
          out.push(...compatBlockLines());
          summary.compatBlockInserted = true;
        }
        break;
      case 'WideRegister':
        if (node.address > 0xfe) {
          rangeWarning(
            diagnostics,
            file,
            node,
            `sfr16 "${node.name}" low byte 0x${formatHex(node.address, 2)} leaves no room for its high byte.`,
          );
        }
        out.push(rewriteWideRegister(node));
        break;
      case 'PlainRegister':
        if (node.address > 0xff) {
          rangeWarning(
            diagnostics,
            file,
            node,
            `sfr "${node.name}" address 0x${node.addressDigits.toUpperCase()} does not fit in one byte.`,
          );
        }
        out.push(rewritePlainRegister(node));
        break;
      case 'BitAlias': {
        const rewritten = rewriteBitAlias(node, table);
        if (rewritten === undefined) {
          summary.unresolved.push({ line: node.line, name: node.name, base: node.base });
          diagnostics.push({
            id: DiagnosticIds.UnresolvedBaseRegister,
            severity: 'warning',
            message: `sbit "${node.name}" references unknown register "${node.base}"; line left unchanged.`,
            file,
            line: node.line,
            column: 1,
          });
          out.push(node.text);
        } else {
          out.push(rewritten);
        }
        break;
      }
      case 'ExternalAbsolute':
        out.push(rewriteExternalAbsolute(node));
        break;
      case 'Unclassified': {
        let text = node.text;
        if (options.stripTypedefQualifiers) text = stripTypedefQualifiers(text);
        if (options.bitKeyword) text = rewriteBitKeyword(text);
        out.push(text);
        break;
      }
    }
  }

  if (!summary.compatBlockInserted) {
    diagnostics.push({
      id: DiagnosticIds.AnchorNotFound,
      severity: 'info',
      message: 'No anchor line found; memory-class compatibility block not inserted.',
      file,
    });
  }

  return { lines: out, summary };
}
