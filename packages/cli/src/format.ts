/**
 * Output formatting for results and symbol listings
 */

import type { SymbolEntry } from '@tally/calculator';
import chalk from 'chalk';

export interface Palette {
  green: (s: string) => string;
  red: (s: string) => string;
  cyan: (s: string) => string;
  gray: (s: string) => string;
  bold: (s: string) => string;
}

const plain: Palette = {
  green: (s) => s,
  red: (s) => s,
  cyan: (s) => s,
  gray: (s) => s,
  bold: (s) => s,
};

export function createPalette(color: boolean): Palette {
  return color ? chalk : plain;
}

/**
 * Format a result
 *
 * Without a precision the shortest text that reads back as the same number is
 * used. With one, the value is rounded to that many significant digits and
 * trailing zeros are dropped.
 *
 * @example
 * ```ts
 * formatNumber(Math.PI, 6)     // => '3.14159'
 * formatNumber(1000, 6)        // => '1000'
 * formatNumber(479001600, 6)   // => '4.79002e+8'
 * ```
 */
export function formatNumber(value: number, precision?: number): string {
  if (precision === undefined || !Number.isFinite(value)) {
    return String(value);
  }

  const [mantissa, exponent] = value.toPrecision(precision).split('e');
  const trimmed = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
  return exponent === undefined ? trimmed : `${trimmed}e${exponent}`;
}

export function formatSymbols(
  entries: Iterable<SymbolEntry>,
  palette: Palette,
  precision?: number,
): string {
  const lines = ['', palette.bold('Symbols:')];
  for (const { name, value, constant } of entries) {
    const suffix = constant ? palette.gray(' (constant)') : '';
    lines.push(`${palette.cyan(name)}\t${formatNumber(value, precision)}${suffix}`);
  }
  lines.push('', '');
  return lines.join('\n');
}
