export { Lexer } from './lexer';
export { BufferedSource, type CharacterSource } from './source';
export { KEYWORDS, PUNCTUATION, TokenKind, type MarkerKind } from './token-kinds';
export type { MarkerToken, NameToken, NumberToken, SourcePosition, Token } from './token';
