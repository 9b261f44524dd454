/**
 * Token kinds for the calculator lexer
 */

export const TokenKind = {
  // Values
  NUMBER: 'NUMBER', // 42, 3.14, .5, 1e3
  NAME: 'NAME', // x, rate_2

  // Statement terminator
  PRINT: 'PRINT', // ; or newline

  // Commands
  QUIT: 'QUIT', // q, quit
  HELP: 'HELP', // help
  SYMBOLS: 'SYMBOLS', // symbols

  // Declarations
  DECLARE: 'DECLARE', // let, #
  CONST: 'CONST', // const

  // Functions
  SQRT: 'SQRT', // sqrt
  POW: 'POW', // pow

  // Operators
  ASSIGN: 'ASSIGN', // =
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  BANG: 'BANG', // !

  // Punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];

/** Kinds that carry no payload */
export type MarkerKind = Exclude<TokenKind, typeof TokenKind.NUMBER | typeof TokenKind.NAME>;

/** Kinds a single source character stands for */
export const PUNCTUATION: ReadonlyMap<string, MarkerKind> = new Map([
  [';', TokenKind.PRINT],
  ['\n', TokenKind.PRINT],
  ['#', TokenKind.DECLARE],
  ['=', TokenKind.ASSIGN],
  ['(', TokenKind.LPAREN],
  [')', TokenKind.RPAREN],
  ['{', TokenKind.LBRACE],
  ['}', TokenKind.RBRACE],
  [',', TokenKind.COMMA],
  ['+', TokenKind.PLUS],
  ['-', TokenKind.MINUS],
  ['*', TokenKind.STAR],
  ['/', TokenKind.SLASH],
  ['%', TokenKind.PERCENT],
  ['!', TokenKind.BANG],
]);

/** Reserved words; none of them can name a variable */
export const KEYWORDS: ReadonlyMap<string, MarkerKind> = new Map([
  ['let', TokenKind.DECLARE],
  ['const', TokenKind.CONST],
  ['sqrt', TokenKind.SQRT],
  ['pow', TokenKind.POW],
  ['help', TokenKind.HELP],
  ['symbols', TokenKind.SYMBOLS],
  ['q', TokenKind.QUIT],
  ['quit', TokenKind.QUIT],
]);
