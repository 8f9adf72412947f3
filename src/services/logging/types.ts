/**
 * Logging type definitions.
 */

/**
 * Logger names. Each service logs under its own scope.
 */
export type LoggerName = "provision" | "process" | "git" | "config";

/**
 * Log levels, from most to least verbose.
 */
export const LogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Structured context attached to a log message.
 * Values are primitives so they serialize predictably.
 */
export type LogContext = Readonly<Record<string, string | number | boolean | null>>;

/**
 * Scoped logger.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Factory for scoped loggers.
 */
export interface LoggingService {
  createLogger(name: LoggerName): Logger;
}

/**
 * Format a message with its context for line-oriented transports.
 *
 * @example formatLogMessage("Installed", { id: "git" }) // "Installed id=git"
 */
export function formatLogMessage(message: string, context?: LogContext): string {
  if (!context) {
    return message;
  }
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${String(value)}`);
  return pairs.length > 0 ? `${message} ${pairs.join(" ")}` : message;
}
