/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => Logger>;
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
  fatal: Mock<Logger['fatal']>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@tally/logger/mock';
 *
 * const logger = createMockLogger();
 * await runRepl({ input, output, errorOutput: output, logger, palette });
 *
 * expect(logger.info).toHaveBeenCalledWith('session_ended', {
 *   statements: 2,
 *   errors: 0,
 *   quit: false,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn<(metadata: Record<string, unknown>) => Logger>(),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    fatal: vi.fn<Logger['fatal']>(),
  };

  // Make child() return a new mock logger that also has spy functions
  mockLogger.child.mockImplementation(() => createMockLogger());

  return mockLogger;
}
