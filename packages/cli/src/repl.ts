/**
 * Read-evaluate-print loop
 *
 * Feeds input to a calculator session one line at a time and prints what each
 * statement or command produced.
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { Session, SymbolTable, type SessionEvent } from '@tally/calculator';
import type { Logger } from '@tally/logger';
import { formatNumber, formatSymbols, type Palette } from './format.js';
import { banner, helpText, PROMPT } from './help.js';

export interface TextOutput {
  write(text: string): unknown;
}

export interface ReplOptions {
  input: Readable;
  output: TextOutput;
  errorOutput: TextOutput;
  logger: Logger;
  palette: Palette;
  /** Print the prompt before each line */
  interactive?: boolean;
  banner?: boolean;
  /** Significant digits in results */
  precision?: number;
  symbols?: SymbolTable;
}

export interface ReplSummary {
  statements: number;
  errors: number;
  /** True when the session ended on a quit command rather than end of input */
  quit: boolean;
}

export async function runRepl(options: ReplOptions): Promise<ReplSummary> {
  const { input, output, errorOutput, logger, palette, interactive = false, precision } = options;
  const session = new Session(options.symbols ?? SymbolTable.withDefaults());

  logger.info('session_started', { interactive });

  if (options.banner ?? true) {
    output.write(banner(palette));
  }

  const render = (event: SessionEvent): void => {
    switch (event.type) {
      case 'result':
        output.write(`${palette.green('=')} ${formatNumber(event.value, precision)}\n`);
        break;
      case 'error':
        logger.debug('statement_failed', {
          code: event.error.code,
          message: event.error.message,
        });
        errorOutput.write(`${palette.red('error:')} ${event.error.message}\n`);
        break;
      case 'help':
        output.write(helpText(palette));
        break;
      case 'symbols':
        output.write(formatSymbols(event.entries, palette, precision));
        break;
      case 'quit':
        break;
    }
  };

  const lines = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  try {
    if (interactive) output.write(PROMPT);
    for await (const line of lines) {
      session.feed(`${line}\n`).forEach(render);
      if (session.closed) break;
      if (interactive) output.write(PROMPT);
    }
  } finally {
    lines.close();
  }

  const summary: ReplSummary = {
    statements: session.statements,
    errors: session.errors,
    quit: session.closed,
  };
  logger.info('session_ended', { ...summary });
  return summary;
}
