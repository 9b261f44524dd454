/**
 * tally command: wires configuration, logging and input to the REPL
 */

import * as fs from 'node:fs/promises';
import { Readable } from 'node:stream';
import { createLogger, type LogSink } from '@tally/logger';
import type { TallyConfig } from './config.js';
import { createPalette } from './format.js';
import { runRepl, type TextOutput } from './repl.js';

export interface RunOptions {
  /** Read statements from this file instead of standard input */
  file?: string;
  precision?: number;
  banner: boolean;
  color: boolean;
}

export interface RunIO {
  stdin: Readable & { isTTY?: boolean };
  stdout: TextOutput;
  stderr: TextOutput;
}

/**
 * Exit status for a failure that escaped the session
 *
 * Statement errors never get here; they are reported and the session goes on.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof Error ? 1 : 2;
}

/**
 * Run the calculator to completion
 * @returns the process exit status
 */
export async function run(options: RunOptions, config: TallyConfig, io: RunIO): Promise<number> {
  const sink: LogSink = (line) => {
    io.stderr.write(`${line}\n`);
  };
  const logger = createLogger({
    environment: config.environment ?? 'production',
    minLevel: config.logLevel,
    sink,
  }).child({ source: options.file ?? 'stdin' });

  for (const warning of config.warnings) {
    logger.warn('invalid_config', { warning });
  }

  const palette = createPalette(options.color);

  try {
    const input = options.file
      ? Readable.from([await fs.readFile(options.file, 'utf-8')])
      : io.stdin;
    await runRepl({
      input,
      output: io.stdout,
      errorOutput: io.stderr,
      logger,
      palette,
      interactive: !options.file && io.stdin.isTTY === true,
      banner: options.banner,
      precision: options.precision ?? config.precision,
    });
    return 0;
  } catch (error) {
    const code = exitCodeFor(error);
    logger.fatal('unexpected_failure', { error, exit_code: code });
    if (error instanceof Error) {
      io.stderr.write(`${palette.red('error:')} ${error.message}\n`);
    } else {
      io.stderr.write(`${palette.red('Oops: unknown exception!')}\n`);
    }
    return code;
  }
}
