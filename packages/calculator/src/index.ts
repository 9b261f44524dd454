/**
 * @tally/calculator
 *
 * Line-oriented arithmetic calculator with variables, constants, factorial,
 * sqrt and pow. Parsing and evaluation happen in a single recursive descent
 * pass over a token stream.
 */

export {
  CalculatorArithmeticError,
  CalculatorError,
  CalculatorLexError,
  CalculatorReferenceError,
  CalculatorSyntaxError,
  type ArithmeticErrorCode,
  type CalculatorErrorCode,
  type LexErrorCode,
  type ReferenceErrorCode,
  type SyntaxErrorCode,
} from './errors';
export { Evaluator, evaluateStatement, type StatementResult } from './evaluator/index';
export {
  BufferedSource,
  Lexer,
  TokenKind,
  type CharacterSource,
  type SourcePosition,
  type Token,
} from './lexer/index';
export { evaluate, Session, type SessionEvent } from './session';
export { PREDEFINED_SYMBOLS, SymbolTable, type SymbolEntry } from './symbols/index';
