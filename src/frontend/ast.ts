/**
 * Fields shared by every classified header line.
 */
export interface LineNodeBase {
  /** 1-based line number in the source file. */
  line: number;
  /** Raw line text, without its terminator. */
  text: string;
}

/**
 * Marker line after which the compatibility macro block is inserted. Emitted unchanged.
 */
export interface AnchorLineNode extends LineNodeBase {
  kind: 'Anchor';
}

/**
 * `sfr16 NAME = 0xLL;`: a register pair whose name is bound to the low byte.
 */
export interface WideRegisterNode extends LineNodeBase {
  kind: 'WideRegister';
  indent: string;
  name: string;
  /** Address of the low byte. */
  address: number;
  /** Text after the terminating `;`, kept verbatim. */
  trailer: string;
}

/**
 * `sfr NAME = 0xHH;`
 */
export interface PlainRegisterNode extends LineNodeBase {
  kind: 'PlainRegister';
  indent: string;
  name: string;
  /** Hex digits exactly as written (no `0x`). */
  addressDigits: string;
  address: number;
  trailer: string;
}

/**
 * `sbit NAME = REG^b;`
 */
export interface BitAliasNode extends LineNodeBase {
  kind: 'BitAlias';
  indent: string;
  name: string;
  base: string;
  /** 0..7 */
  bit: number;
  trailer: string;
}

/**
 * `EXTERN <type> NAME _AT_ 0xADDR;`
 */
export interface ExternalAbsoluteNode extends LineNodeBase {
  kind: 'ExternalAbsolute';
  indent: string;
  /** Type tokens between `EXTERN` and the name, verbatim. */
  typeText: string;
  name: string;
  addressDigits: string;
  trailer: string;
}

/**
 * Anything else: comments, preprocessor lines, typedefs, blanks, malformed declarations.
 */
export interface UnclassifiedLineNode extends LineNodeBase {
  kind: 'Unclassified';
}

export type DeclarationNode =
  | WideRegisterNode
  | PlainRegisterNode
  | BitAliasNode
  | ExternalAbsoluteNode;

export type HeaderLineNode = AnchorLineNode | DeclarationNode | UnclassifiedLineNode;

export type HeaderLineKind = HeaderLineNode['kind'];
