import { PREDEFINED_SYMBOLS } from '@tally/calculator';
import { formatNumber, type Palette } from './format.js';

export const PROMPT = '> ';

export function banner(palette: Palette): string {
  return `Welcome to ${palette.bold('Tally')}.\nEnter 'help' to learn how to use this program.\n\n`;
}

export function helpText(palette: Palette): string {
  const predefined = PREDEFINED_SYMBOLS.map(
    ({ name, value, constant }) =>
      `\t\t${name}\t\t${formatNumber(value)}${constant ? ' (constant)' : ''}`,
  );

  return [
    '',
    palette.bold('Tally Help'),
    '',
    '\tBasic Syntax:',
    "\t\tEnter 'help' to see this message.",
    "\t\tEnter 'quit' or 'q' to exit the program.",
    "\t\tEnter ';' or a new line to print the results.",
    "\t\tSupported operators: '*', '/', '%', '!', '+', '-', '=' (assignment).",
    "\t\tParentheses and braces group expressions: '4*(2+3)', '{1+2}*3'.",
    '',
    '\tFunctions:',
    '\t\tsqrt(n)\t\t\tsquare root of n.',
    '\t\tpow(n, e)\t\tn raised to the power e.',
    '',
    '\tUser Variables:',
    "\t\tNames start with a letter and continue with letters, digits and '_':",
    "\t\t'a_var3', 'X', 'y2'.",
    '\t\tlet var = expr\t\tdeclare a variable named var with the value of expr.',
    '\t\t# var = expr\t\tsame as let.',
    '\t\tconst var = expr\tdeclare a constant named var.',
    '\t\tvar = expr\t\tassign a new value to a declared variable.',
    "\t\tEnter 'symbols' to see all names and their values.",
    '',
    '\tPredefined Names:',
    ...predefined,
    '',
    '',
  ].join('\n');
}
