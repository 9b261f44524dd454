import {
  CalculatorError,
  CalculatorReferenceError,
  CalculatorSyntaxError,
  type SyntaxErrorCode,
} from '../errors';
import type { Lexer } from '../lexer/lexer';
import type { Token } from '../lexer/token';
import { TokenKind } from '../lexer/token-kinds';
import type { SymbolTable } from '../symbols/symbol-table';
import { divide, factorial, pow, remainder, sqrt } from './math';

/**
 * Outcome of evaluating one statement
 */
export type StatementResult =
  | { ok: true; value: number }
  | { ok: false; error: CalculatorError };

/**
 * Recursive descent evaluator
 *
 * Parsing and evaluation happen in the same pass: each grammar level reads
 * tokens and returns the value of what it read.
 *
 * Precedence (lowest to highest):
 * 1. Statement (declaration, assignment, expression)
 * 2. Additive (+, -)
 * 3. Multiplicative (*, /, %)
 * 4. Postfix factorial (!)
 * 5. Primary (numbers, names, grouping, unary +/-, function calls)
 *
 * Unary signs recurse into primary, so `-2!` is `(-2)!`.
 */
export class Evaluator {
  constructor(
    private readonly lexer: Lexer,
    private readonly symbols: SymbolTable,
  ) {}

  statement(): number {
    const token = this.lexer.get();

    switch (token.type) {
      case TokenKind.CONST:
        return this.declaration(true);
      case TokenKind.DECLARE:
        return this.declaration(false);
      case TokenKind.NAME: {
        const next = this.lexer.get();
        this.lexer.putback(next);
        this.lexer.putback(token);
        if (next.type === TokenKind.ASSIGN) {
          return this.assignment();
        }
        return this.expression();
      }
      default:
        this.lexer.putback(token);
        return this.expression();
    }
  }

  private declaration(constant: boolean): number {
    const name = this.lexer.get();
    if (name.type !== TokenKind.NAME) {
      throw new CalculatorSyntaxError('NAME_EXPECTED', 'Name expected in declaration', name.loc);
    }

    const equals = this.lexer.get();
    if (equals.type !== TokenKind.ASSIGN) {
      throw new CalculatorSyntaxError(
        'MISSING_EQUALS',
        `'=' missing in declaration of ${name.name}`,
        equals.loc,
      );
    }

    const value = this.expression();
    return this.symbols.define(name.name, value, constant);
  }

  private assignment(): number {
    const name = this.lexer.get();
    if (name.type !== TokenKind.NAME) {
      throw new CalculatorSyntaxError('NAME_EXPECTED', 'Name expected in assignment', name.loc);
    }
    if (!this.symbols.isDeclared(name.name)) {
      throw new CalculatorReferenceError(
        'UNDECLARED_VARIABLE',
        `${name.name} has not been declared`,
        name.loc,
      );
    }

    this.lexer.get(); // skip '='
    const value = this.expression();
    this.symbols.setValue(name.name, value);
    return value;
  }

  private expression(): number {
    let left = this.term();

    while (true) {
      const token = this.lexer.get();
      switch (token.type) {
        case TokenKind.PLUS:
          left += this.term();
          break;
        case TokenKind.MINUS:
          left -= this.term();
          break;
        default:
          this.lexer.putback(token);
          return left;
      }
    }
  }

  private term(): number {
    let left = this.secondary();

    while (true) {
      const token = this.lexer.get();
      switch (token.type) {
        case TokenKind.STAR:
          left *= this.secondary();
          break;
        case TokenKind.SLASH:
          left = divide(left, this.secondary(), token.loc);
          break;
        case TokenKind.PERCENT:
          left = remainder(left, this.secondary(), token.loc);
          break;
        default:
          this.lexer.putback(token);
          return left;
      }
    }
  }

  private secondary(): number {
    let left = this.primary();

    while (true) {
      const token = this.lexer.get();
      if (token.type !== TokenKind.BANG) {
        this.lexer.putback(token);
        return left;
      }
      left = factorial(left, token.loc);
    }
  }

  private primary(): number {
    const token = this.lexer.get();

    switch (token.type) {
      case TokenKind.LPAREN: {
        const value = this.expression();
        this.expect(TokenKind.RPAREN, 'UNMATCHED_PAREN', "')' expected");
        return value;
      }
      case TokenKind.LBRACE: {
        const value = this.expression();
        this.expect(TokenKind.RBRACE, 'UNMATCHED_BRACE', "'}' expected");
        return value;
      }
      case TokenKind.NUMBER:
        return token.value;
      case TokenKind.MINUS:
        return -this.primary();
      case TokenKind.PLUS:
        return +this.primary();
      case TokenKind.NAME:
        return this.symbols.getValue(token.name);
      case TokenKind.SQRT:
      case TokenKind.POW:
        return this.call(token);
      default:
        throw new CalculatorSyntaxError('PRIMARY_EXPECTED', 'Primary expected', token.loc);
    }
  }

  private call(fn: Token): number {
    if (fn.type === TokenKind.SQRT) {
      this.expect(TokenKind.LPAREN, 'PAREN_EXPECTED', "sqrt: '(' expected");
      const argument = this.expression();
      this.expect(TokenKind.RPAREN, 'PAREN_EXPECTED', "sqrt: ')' expected");
      return sqrt(argument, fn.loc);
    }

    this.expect(TokenKind.LPAREN, 'PAREN_EXPECTED', "pow: '(' expected");
    const base = this.expression();
    this.expect(TokenKind.COMMA, 'COMMA_EXPECTED', "pow: ',' expected");
    const exponent = this.expression();
    this.expect(TokenKind.RPAREN, 'PAREN_EXPECTED', "pow: ')' expected");
    return pow(base, exponent);
  }

  private expect(type: TokenKind, code: SyntaxErrorCode, message: string): Token {
    const token = this.lexer.get();
    if (token.type !== type) {
      throw new CalculatorSyntaxError(code, message, token.loc);
    }
    return token;
  }
}

/**
 * Evaluate exactly one statement
 *
 * Calculator errors are returned rather than thrown; anything else is a bug
 * or an input failure and propagates.
 *
 * @example
 * ```ts
 * const lexer = new Lexer(new BufferedSource('let x = 2 * 21\n'));
 * evaluateStatement(lexer, SymbolTable.withDefaults());
 * // => { ok: true, value: 42 }
 * ```
 */
export function evaluateStatement(lexer: Lexer, symbols: SymbolTable): StatementResult {
  try {
    return { ok: true, value: new Evaluator(lexer, symbols).statement() };
  } catch (error) {
    if (error instanceof CalculatorError) {
      return { ok: false, error };
    }
    throw error;
  }
}
