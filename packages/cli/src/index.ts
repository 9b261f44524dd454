#!/usr/bin/env node

/**
 * tally CLI - interactive expression calculator
 */

import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from '@tally/logger';
import { loadConfig, parsePrecision } from './config.js';
import { run } from './run.js';

interface CommandOptions {
  precision?: number;
  logLevel?: LogLevel;
  banner: boolean;
  color: boolean;
}

const program = new Command();

program
  .name('tally')
  .description('Interactive calculator with variables, constants, sqrt, pow and factorial')
  .version('0.1.0')
  .argument('[file]', 'Read statements from a file instead of standard input')
  .option('-p, --precision <digits>', 'Significant digits in results (1-100)', (value: string) => {
    const digits = parsePrecision(value);
    if (digits === undefined) {
      throw new InvalidArgumentError('Expected an integer from 1 to 100.');
    }
    return digits;
  })
  .option('--log-level <level>', 'Minimum log level: debug, info, warn, error, fatal', (value: string): LogLevel => {
    if (!isLogLevel(value)) {
      throw new InvalidArgumentError('Expected debug, info, warn, error or fatal.');
    }
    return value;
  })
  .option('--no-banner', 'Do not print the welcome banner')
  .option('--no-color', 'Disable colored output')
  .action(async (file: string | undefined, options: CommandOptions) => {
    const { logLevel, ...runOptions } = options;
    const config = loadConfig();
    process.exitCode = await run(
      { file, ...runOptions },
      { ...config, logLevel: logLevel ?? config.logLevel },
      { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
    );
  });

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  console.error('Oops:', error instanceof Error ? error.message : error);
  process.exit(2);
});
