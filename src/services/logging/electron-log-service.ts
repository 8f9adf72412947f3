/**
 * LoggingService backed by electron-log's Node entry.
 *
 * Console output is line-oriented and always on; the file transport is only
 * enabled when a log file path is given.
 */

import log from "electron-log/node";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { formatLogMessage } from "./types";

export interface ElectronLogServiceOptions {
  /** Minimum level written to the console */
  readonly consoleLevel: LogLevel;
  /** Optional file that receives every message at debug level and above */
  readonly logFile?: string;
}

export class ElectronLogService implements LoggingService {
  constructor(options: ElectronLogServiceOptions) {
    log.transports.console.level = options.consoleLevel;
    log.transports.console.format = "[{level}] {scope} {text}";

    const logFile = options.logFile;
    if (logFile) {
      log.transports.file.level = "debug";
      log.transports.file.resolvePathFn = () => logFile;
    } else {
      log.transports.file.level = false;
    }
  }

  createLogger(name: LoggerName): Logger {
    const scoped = log.scope(name);
    return {
      debug: (message: string, context?: LogContext) =>
        scoped.debug(formatLogMessage(message, context)),
      info: (message: string, context?: LogContext) =>
        scoped.info(formatLogMessage(message, context)),
      warn: (message: string, context?: LogContext) =>
        scoped.warn(formatLogMessage(message, context)),
      error: (message: string, context?: LogContext) =>
        scoped.error(formatLogMessage(message, context)),
    };
  }
}
