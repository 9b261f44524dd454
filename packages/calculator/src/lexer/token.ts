import type { MarkerKind, TokenKind } from './token-kinds';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of input */
  offset: number;
}

interface TokenBase {
  /** Where the token starts */
  readonly loc: SourcePosition;
}

export interface NumberToken extends TokenBase {
  readonly type: typeof TokenKind.NUMBER;
  readonly value: number;
}

export interface NameToken extends TokenBase {
  readonly type: typeof TokenKind.NAME;
  readonly name: string;
}

export interface MarkerToken extends TokenBase {
  readonly type: MarkerKind;
}

/**
 * A token produced by the lexer
 */
export type Token = NumberToken | NameToken | MarkerToken;
