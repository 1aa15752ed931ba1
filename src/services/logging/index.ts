/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel, SILENT_LOGGER } from "./types.js";
export type { ElectronLogServiceOptions } from "./electron-log-service.js";
export { ElectronLogService } from "./electron-log-service.js";
