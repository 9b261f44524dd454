import { CalculatorLexError, type LexErrorCode } from '../errors';
import type { CharacterSource } from './source';
import type { NameToken, NumberToken, SourcePosition, Token } from './token';
import { KEYWORDS, PUNCTUATION, TokenKind, type MarkerKind } from './token-kinds';

/**
 * Token stream over a character source
 *
 * Tokens are read one at a time and can be pushed back for lookahead. Pushed
 * back tokens come out again last-in, first-out.
 */
export class Lexer {
  private readonly buffer: Token[] = [];
  /** Token most recently handed out by get() */
  private delivered: Token | null = null;

  constructor(private readonly source: CharacterSource) {}

  get(): Token {
    this.delivered = null;
    const token = this.buffer.pop() ?? this.scan();
    this.delivered = token;
    return token;
  }

  putback(token: Token): void {
    this.buffer.push(token);
  }

  /**
   * Discard input up to and including the next terminator
   *
   * Used after an error to resume at the next statement.
   */
  ignore(terminator: MarkerKind = TokenKind.PRINT): void {
    while (this.buffer.length > 0) {
      const token = this.buffer.pop();
      if (token?.type === terminator) {
        this.delivered = null;
        return;
      }
    }

    // The failed statement already consumed its terminator
    if (this.delivered?.type === terminator) {
      this.delivered = null;
      return;
    }
    this.delivered = null;

    const stops = terminatorCharacters(terminator);
    for (let char = this.source.read(); char !== null; char = this.source.read()) {
      if (stops.includes(char)) return;
    }
  }

  /**
   * Skip empty statements and return the next command or statement start
   *
   * Commands (quit, help, symbols) are consumed. Any other token is pushed
   * back so the evaluator reads it again. Returns null once input runs out.
   */
  nextCommandOrStatement(): Token | null {
    while (!this.atEnd()) {
      const token = this.get();
      switch (token.type) {
        case TokenKind.PRINT:
          continue;
        case TokenKind.QUIT:
        case TokenKind.HELP:
        case TokenKind.SYMBOLS:
          return token;
        default:
          this.putback(token);
          return token;
      }
    }
    return null;
  }

  /**
   * True when nothing but blanks is left to read
   */
  atEnd(): boolean {
    if (this.buffer.length > 0) return false;
    this.skipBlanks();
    return this.source.exhausted();
  }

  private error(code: LexErrorCode, message: string, position: SourcePosition): never {
    throw new CalculatorLexError(code, message, position);
  }

  private skipBlanks(): void {
    for (let char = this.source.read(); char !== null; char = this.source.read()) {
      if (!isBlank(char)) {
        this.source.unread(char);
        return;
      }
    }
  }

  private scan(): Token {
    this.skipBlanks();
    const start = this.source.position();
    const char = this.source.read();

    if (char === null) {
      this.error('BAD_TOKEN', 'Bad token: unexpected end of input', start);
    }

    const kind = PUNCTUATION.get(char);
    if (kind !== undefined) {
      return { type: kind, loc: start };
    }

    if (isDigit(char) || char === '.') {
      this.source.unread(char);
      return this.number(start);
    }

    if (isAlpha(char)) {
      return this.word(char, start);
    }

    this.error('BAD_TOKEN', `Bad token '${char}'`, start);
  }

  private number(start: SourcePosition): NumberToken {
    let text = this.digits();
    if (this.accept('.')) {
      text += '.' + this.digits();
    }
    if (text === '.') {
      this.error('BAD_NUMBER', "Malformed number '.'", start);
    }

    const marker = this.source.read();
    if (marker === 'e' || marker === 'E') {
      text += marker;
      if (this.accept('+')) {
        text += '+';
      } else if (this.accept('-')) {
        text += '-';
      }
      const exponent = this.digits();
      if (exponent === '') {
        this.error('BAD_NUMBER', `Malformed number '${text}'`, start);
      }
      text += exponent;
    } else if (marker !== null) {
      this.source.unread(marker);
    }

    return { type: TokenKind.NUMBER, value: Number(text), loc: start };
  }

  private digits(): string {
    let text = '';
    for (let char = this.source.read(); char !== null; char = this.source.read()) {
      if (!isDigit(char)) {
        this.source.unread(char);
        break;
      }
      text += char;
    }
    return text;
  }

  private accept(expected: string): boolean {
    const char = this.source.read();
    if (char === expected) return true;
    if (char !== null) this.source.unread(char);
    return false;
  }

  private word(first: string, start: SourcePosition): Token {
    let text = first;
    for (let char = this.source.read(); char !== null; char = this.source.read()) {
      if (!isAlphaNumeric(char) && char !== '_') {
        this.source.unread(char);
        break;
      }
      text += char;
    }

    const keyword = KEYWORDS.get(text);
    if (keyword !== undefined) {
      return { type: keyword, loc: start };
    }
    const token: NameToken = { type: TokenKind.NAME, name: text, loc: start };
    return token;
  }
}

function terminatorCharacters(terminator: MarkerKind): string[] {
  const chars: string[] = [];
  for (const [char, kind] of PUNCTUATION) {
    if (kind === terminator) chars.push(char);
  }
  return chars;
}

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\r' || char === '\v' || char === '\f';
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isAlpha(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
}

function isAlphaNumeric(char: string): boolean {
  return isAlpha(char) || isDigit(char);
}
