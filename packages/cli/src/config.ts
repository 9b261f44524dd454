/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@tally/logger';

export interface TallyConfig {
  environment?: Environment;
  logLevel?: LogLevel;
  precision?: number;
  /** Settings that were present but could not be used */
  warnings: string[];
}

/**
 * Read `KEY=value` lines such as `TALLY_PRECISION=8`
 *
 * Blank lines, `#` comments and lines without `=` are skipped. One pair of
 * matching quotes around a value is removed.
 */
function parseEnvFile(content: string): Record<string, string> {
  const entries: Record<string, string> = {};

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;

    const separator = line.indexOf('=');
    if (separator === -1) continue;

    const value = line.slice(separator + 1).trim();
    entries[line.slice(0, separator).trim()] = unquote(value);
  }

  return entries;
}

function unquote(value: string): string {
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return {};
    }
    currentDir = parentDir;
  }
}

/**
 * Parse a significant-digit count accepted by Number.prototype.toPrecision
 * @returns undefined when the text is not an integer from 1 to 100
 */
export function parsePrecision(text: string): number | undefined {
  if (!/^\d+$/.test(text.trim())) return undefined;
  const digits = Number(text);
  return digits >= 1 && digits <= 100 ? digits : undefined;
}

/**
 * Load tally configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): TallyConfig {
  const settings = { ...findEnvFile(cwd) };
  for (const key of ['TALLY_ENV', 'TALLY_LOG_LEVEL', 'TALLY_PRECISION']) {
    const value = env[key];
    if (value) {
      settings[key] = value;
    }
  }

  const config: TallyConfig = { warnings: [] };

  const environment = settings.TALLY_ENV;
  if (environment !== undefined) {
    if (isEnvironment(environment)) {
      config.environment = environment;
    } else {
      config.warnings.push(`Unknown TALLY_ENV '${environment}'`);
    }
  }

  const logLevel = settings.TALLY_LOG_LEVEL;
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      config.warnings.push(`Unknown TALLY_LOG_LEVEL '${logLevel}'`);
    }
  }

  const precision = settings.TALLY_PRECISION;
  if (precision !== undefined) {
    config.precision = parsePrecision(precision);
    if (config.precision === undefined) {
      config.warnings.push(`TALLY_PRECISION must be an integer from 1 to 100, got '${precision}'`);
    }
  }

  return config;
}
