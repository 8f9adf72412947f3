/**
 * Public API exports for the logging service.
 */

export type { Logger, LoggingService, LogContext, LoggerName } from "./types";
export { LogLevel, formatLogMessage } from "./types";
export { ElectronLogService } from "./electron-log-service";
