/**
 * Arithmetic behind the operators and built-in functions
 *
 * Each function checks its operands and throws before computing anything.
 */

import { CalculatorArithmeticError } from '../errors';
import type { SourcePosition } from '../lexer/token';

const INT32_MAX = 2 ** 31 - 1;

export function divide(left: number, right: number, position: SourcePosition | null = null): number {
  if (right === 0) {
    throw new CalculatorArithmeticError('DIVIDE_BY_ZERO', 'Divide by zero', position);
  }
  return left / right;
}

/**
 * Floating-point remainder; the result takes the sign of the dividend
 */
export function remainder(
  left: number,
  right: number,
  position: SourcePosition | null = null,
): number {
  if (right === 0) {
    throw new CalculatorArithmeticError('MODULO_BY_ZERO', '%: divide by zero', position);
  }
  return left % right;
}

/**
 * Factorial over 32-bit integers
 *
 * The operand is truncated toward zero. The product is built from n down to 1
 * with wrapping 32-bit multiplication; a step whose product no longer divides
 * back to its multiplier has overflowed.
 */
export function factorial(operand: number, position: SourcePosition | null = null): number {
  const n = Math.trunc(operand);
  if (n < 0) {
    throw new CalculatorArithmeticError(
      'NEGATIVE_FACTORIAL',
      'Cannot get factorial of negative number',
      position,
    );
  }
  if (!Number.isFinite(n) || n > INT32_MAX) {
    throw new CalculatorArithmeticError('FACTORIAL_OVERFLOW', 'Factorial overflow', position);
  }

  let product = n === 0 ? 1 : n;
  for (let multiplier = product - 1; multiplier > 0; multiplier--) {
    const previous = product;
    product = Math.imul(product, multiplier);
    if (Math.trunc(product / previous) !== multiplier) {
      throw new CalculatorArithmeticError('FACTORIAL_OVERFLOW', 'Factorial overflow', position);
    }
  }
  return product;
}

export function sqrt(operand: number, position: SourcePosition | null = null): number {
  if (operand < 0) {
    throw new CalculatorArithmeticError(
      'NEGATIVE_SQRT',
      'Cannot get square root of negative number',
      position,
    );
  }
  return Math.sqrt(operand);
}

export function pow(base: number, exponent: number): number {
  return Math.pow(base, exponent);
}
