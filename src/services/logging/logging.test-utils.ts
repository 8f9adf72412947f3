/**
 * Mock utilities for logging tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types";

/**
 * Mock logger with vitest spy methods.
 */
export interface MockLogger extends Logger {
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext) => void>;
}

export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => Logger>;
}

/**
 * Create a mock logger that records all calls.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * await installer.installAll(items);
 * expect(logger.warn).toHaveBeenCalledWith("Install failed", expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Create a mock logging service handing out the same mock logger for every name.
 */
export function createMockLoggingService(logger?: MockLogger): MockLoggingService {
  const shared = logger ?? createMockLogger();
  return {
    createLogger: vi.fn().mockReturnValue(shared),
  };
}

/**
 * Logger that discards everything.
 */
export const SILENT_LOGGER: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
