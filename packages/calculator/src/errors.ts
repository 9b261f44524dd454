/**
 * Error types for the calculator
 *
 * Every error carries a code and, when known, the position of the token that
 * caused it. None of them is fatal: the session reports the error and resumes
 * at the next statement.
 */

import type { SourcePosition } from './lexer/token';

export type LexErrorCode = 'BAD_TOKEN' | 'BAD_NUMBER';

export type SyntaxErrorCode =
  | 'NAME_EXPECTED'
  | 'MISSING_EQUALS'
  | 'UNMATCHED_PAREN'
  | 'UNMATCHED_BRACE'
  | 'PRIMARY_EXPECTED'
  | 'COMMA_EXPECTED'
  | 'PAREN_EXPECTED';

export type ReferenceErrorCode =
  | 'UNDEFINED_VARIABLE'
  | 'UNDECLARED_VARIABLE'
  | 'DUPLICATE_DECLARATION'
  | 'CONSTANT_WRITE';

export type ArithmeticErrorCode =
  | 'DIVIDE_BY_ZERO'
  | 'MODULO_BY_ZERO'
  | 'NEGATIVE_FACTORIAL'
  | 'FACTORIAL_OVERFLOW'
  | 'NEGATIVE_SQRT';

export type CalculatorErrorCode =
  | LexErrorCode
  | SyntaxErrorCode
  | ReferenceErrorCode
  | ArithmeticErrorCode;

/**
 * Base class for calculator errors
 */
export abstract class CalculatorError extends Error {
  abstract readonly code: CalculatorErrorCode;
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = this.constructor.name;
    this.position = position;
  }
}

/**
 * Thrown for characters that start no token and for malformed numbers
 */
export class CalculatorLexError extends CalculatorError {
  constructor(
    readonly code: LexErrorCode,
    message: string,
    position: SourcePosition | null = null,
  ) {
    super(message, position);
  }
}

/**
 * Thrown when a statement does not follow the grammar
 */
export class CalculatorSyntaxError extends CalculatorError {
  constructor(
    readonly code: SyntaxErrorCode,
    message: string,
    position: SourcePosition | null = null,
  ) {
    super(message, position);
  }
}

/**
 * Thrown for reads, writes and declarations the symbol table refuses
 */
export class CalculatorReferenceError extends CalculatorError {
  constructor(
    readonly code: ReferenceErrorCode,
    message: string,
    position: SourcePosition | null = null,
  ) {
    super(message, position);
  }
}

/**
 * Thrown when an operation has no defined result (division by zero, etc.)
 */
export class CalculatorArithmeticError extends CalculatorError {
  constructor(
    readonly code: ArithmeticErrorCode,
    message: string,
    position: SourcePosition | null = null,
  ) {
    super(message, position);
  }
}
