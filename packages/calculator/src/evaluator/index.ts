export { Evaluator, evaluateStatement, type StatementResult } from './evaluator';
export { divide, factorial, pow, remainder, sqrt } from './math';
