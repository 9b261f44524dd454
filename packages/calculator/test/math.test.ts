import { describe, expect, it } from 'vitest';
import { CalculatorArithmeticError } from '../src/errors';
import { divide, factorial, pow, remainder, sqrt } from '../src/evaluator/math';
import { thrownBy } from './helpers';

describe('math', () => {
  describe('divide', () => {
    it('divides', () => {
      expect(divide(7, 2)).toBe(3.5);
    });

    it('throws before dividing by zero', () => {
      expect(() => divide(1, 0)).toThrow(CalculatorArithmeticError);
      expect(() => divide(1, -0)).toThrow('Divide by zero');
    });
  });

  describe('remainder', () => {
    it('keeps the sign of the dividend', () => {
      expect(remainder(-7, 3)).toBe(-1);
      expect(remainder(7, -3)).toBe(1);
    });

    it('throws on a zero divisor', () => {
      expect(thrownBy(() => remainder(1, 0))).toMatchObject({ code: 'MODULO_BY_ZERO' });
    });
  });

  describe('factorial', () => {
    it('computes small factorials', () => {
      expect([0, 1, 2, 3, 4, 5, 6].map((n) => factorial(n))).toEqual([1, 1, 2, 6, 24, 120, 720]);
    });

    it('truncates toward zero', () => {
      expect(factorial(3.99)).toBe(6);
      expect(factorial(-0.5)).toBe(1);
    });

    it('rejects negative operands', () => {
      expect(thrownBy(() => factorial(-3))).toMatchObject({ code: 'NEGATIVE_FACTORIAL' });
    });

    it('detects 32-bit overflow', () => {
      expect(factorial(12)).toBe(479001600);
      expect(thrownBy(() => factorial(13))).toMatchObject({ code: 'FACTORIAL_OVERFLOW' });
      expect(thrownBy(() => factorial(2 ** 40))).toMatchObject({ code: 'FACTORIAL_OVERFLOW' });
      expect(thrownBy(() => factorial(Infinity))).toMatchObject({ code: 'FACTORIAL_OVERFLOW' });
    });
  });

  describe('sqrt', () => {
    it('takes square roots', () => {
      expect(sqrt(2.25)).toBe(1.5);
      expect(sqrt(0)).toBe(0);
    });

    it('rejects negative operands', () => {
      expect(thrownBy(() => sqrt(-4))).toMatchObject({
        code: 'NEGATIVE_SQRT',
        message: 'Cannot get square root of negative number',
      });
    });
  });

  describe('pow', () => {
    it('raises to powers', () => {
      expect(pow(2, 10)).toBe(1024);
      expect(pow(4, 0.5)).toBe(2);
      expect(pow(5, 0)).toBe(1);
    });
  });
});
