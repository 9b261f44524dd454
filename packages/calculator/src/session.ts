import { CalculatorError } from './errors';
import { evaluateStatement } from './evaluator/evaluator';
import { Lexer } from './lexer/lexer';
import { BufferedSource } from './lexer/source';
import type { Token } from './lexer/token';
import { PUNCTUATION, TokenKind } from './lexer/token-kinds';
import { SymbolTable, type SymbolEntry } from './symbols/symbol-table';

/**
 * Something the driver has to show after a statement or command
 */
export type SessionEvent =
  | { type: 'result'; value: number }
  | { type: 'error'; error: CalculatorError }
  | { type: 'help' }
  | { type: 'symbols'; entries: SymbolEntry[] }
  | { type: 'quit' };

/**
 * One calculator run: the input read so far and the names declared in it
 *
 * Input is fed in chunks (normally one line with its newline). Every complete
 * statement in the fed text is evaluated before feed() returns. Text after the
 * last `;` or newline is held back until a later feed terminates it.
 */
export class Session {
  readonly symbols: SymbolTable;
  private readonly source = new BufferedSource();
  private readonly lexer = new Lexer(this.source);
  /** Fed text not yet ended by a terminator */
  private pending = '';
  private _closed = false;
  private _statements = 0;
  private _errors = 0;

  constructor(symbols: SymbolTable = SymbolTable.withDefaults()) {
    this.symbols = symbols;
  }

  /** True once a quit command has been read */
  get closed(): boolean {
    return this._closed;
  }

  /** Statements evaluated, failed ones included */
  get statements(): number {
    return this._statements;
  }

  get errors(): number {
    return this._errors;
  }

  feed(text: string): SessionEvent[] {
    if (this._closed) return [];
    this.pending += text;
    const end = completeLength(this.pending);
    if (end === 0) return [];
    this.source.append(this.pending.slice(0, end));
    this.pending = this.pending.slice(end);

    const events: SessionEvent[] = [];
    while (!this._closed) {
      const event = this.step();
      if (event === null) break;
      events.push(event);
    }
    return events;
  }

  private step(): SessionEvent | null {
    let token: Token | null;
    try {
      token = this.lexer.nextCommandOrStatement();
    } catch (error) {
      return this.fail(error);
    }
    if (token === null) return null;

    switch (token.type) {
      case TokenKind.QUIT:
        this._closed = true;
        return { type: 'quit' };
      case TokenKind.HELP:
        return { type: 'help' };
      case TokenKind.SYMBOLS:
        return { type: 'symbols', entries: [...this.symbols.list()] };
    }

    this._statements++;
    const result = evaluateStatement(this.lexer, this.symbols);
    if (!result.ok) {
      return this.fail(result.error);
    }
    return { type: 'result', value: result.value };
  }

  private fail(error: unknown): SessionEvent {
    if (!(error instanceof CalculatorError)) {
      throw error;
    }
    this._errors++;
    this.lexer.ignore(TokenKind.PRINT);
    return { type: 'error', error };
  }
}

/**
 * Length of the prefix of `text` that ends with a statement terminator
 */
function completeLength(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (PUNCTUATION.get(text[i]) === TokenKind.PRINT) return i + 1;
  }
  return 0;
}

/**
 * Evaluate the first statement of `input`
 *
 * @param input - Statement text; a terminator is optional
 * @param symbols - Table to read and declare names in
 * @returns The statement's value
 * @throws {CalculatorError} If the statement fails
 *
 * @example
 * ```ts
 * evaluate('2 + 3 * 4') // => 14
 * evaluate('pow(2, 10)') // => 1024
 * ```
 */
export function evaluate(input: string, symbols: SymbolTable = SymbolTable.withDefaults()): number {
  const lexer = new Lexer(new BufferedSource(`${input}\n`));
  const result = evaluateStatement(lexer, symbols);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
