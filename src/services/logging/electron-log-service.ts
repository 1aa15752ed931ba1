/**
 * ElectronLogService - Logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Session-based log files: `<datetime>-<uuid>.log` (when a logs directory is configured)
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types.js";
import { LogLevel as LogLevelValues } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

const LOG_LEVELS: readonly LogLevel[] = Object.values(LogLevelValues);

const LOGGER_NAMES: readonly LoggerName[] = [
  "network",
  "fs",
  "release-api",
  "fetch",
  "archive",
  "installer",
];

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Options for ElectronLogService.
 */
export interface ElectronLogServiceOptions {
  /** Directory for session log files. File logging is off when omitted. */
  readonly logsDir?: string;
  /** Level used when RELEASE_FETCH_LOGLEVEL is unset. Default: "warn" */
  readonly defaultLevel?: LogLevel;
  /** Environment to read settings from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

/**
 * Parse and validate RELEASE_FETCH_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return LOG_LEVELS.find((level) => level === normalized);
}

/**
 * Parse RELEASE_FETCH_LOGGER to get set of allowed logger names.
 * Unknown names are ignored.
 *
 * @param envValue - Raw environment variable value (comma-separated logger names)
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const requested = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (requested.length === 0) return undefined;
  return new Set(LOGGER_NAMES.filter((name) => requested.includes(name)));
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .slice(0, 19);
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = withContext(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration:
 * - Default level: WARN, or `defaultLevel`
 * - Override via RELEASE_FETCH_LOGLEVEL environment variable
 * - Console output via RELEASE_FETCH_PRINT_LOGS (any truthy value)
 * - Logger filtering via RELEASE_FETCH_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService({ logsDir: "/tmp/release-fetch-logs" });
 *
 * const logger = loggingService.createLogger("installer");
 * logger.info("Installed", { repo: "owner/tool", tag: "v1.2.0" });
 * // Output: [2025-12-16 10:30:00.123] [info] [installer] Installed repo=owner/tool tag=v1.2.0
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly enableConsole: boolean;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(options: ElectronLogServiceOptions = {}) {
    const env = options.env ?? process.env;

    this.logLevel = parseLogLevel(env.RELEASE_FETCH_LOGLEVEL) ?? options.defaultLevel ?? "warn";
    this.enableConsole = !!env.RELEASE_FETCH_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(env.RELEASE_FETCH_LOGGER);

    const logsDir = options.logsDir;
    if (logsDir !== undefined) {
      const filename = generateSessionFilename();
      log.transports.file.resolvePathFn = (): string => join(logsDir, filename);
      log.transports.file.level = this.logLevel;
    } else {
      log.transports.file.level = false;
    }
    log.transports.console.level = this.enableConsole ? this.logLevel : false;

    log.transports.file.format = LOG_FORMAT;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If RELEASE_FETCH_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
