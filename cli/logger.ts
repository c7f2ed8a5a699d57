/**
 * Structured Logger
 *
 * Key behaviors:
 * - Every entry carries level, msg, timestamp and any context fields
 * - JSON output in production for log aggregation
 * - Human-readable output otherwise
 * - Everything goes to stderr; stdout is reserved for the report
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Catalogue built', { products: 120 });
 *   logger.child({ inputFile }).warn('Row rejected', { rowIndex: 4 });
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

/**
 * Read on every call so tests and the CLI can change LOG_LEVEL after import.
 */
function configuredLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(raw)) return raw;
  return isProduction() ? "info" : "debug";
}

function serializeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value instanceof Error) {
      out[key] = {
        name: value.name,
        message: value.message,
        stack: isProduction() ? undefined : value.stack,
      };
    } else if (value instanceof Map) {
      out[key] = Object.fromEntries(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function formatLog(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const fields = serializeContext(context);

  if (isProduction()) {
    return JSON.stringify({ level, msg: message, timestamp, ...fields });
  }

  const contextStr = Object.keys(fields).length > 0 ? " " + JSON.stringify(fields) : "";
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[configuredLevel()];
}

function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!shouldLog(level)) return;
  console.error(formatLog(level, message, context));
}

export type Logger = {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger with `context` merged into every entry. */
  child(context: LogContext): Logger;
};

function createLogger(baseContext: LogContext): Logger {
  return {
    debug: (message, context = {}) => log("debug", message, { ...baseContext, ...context }),
    info: (message, context = {}) => log("info", message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log("warn", message, { ...baseContext, ...context }),
    error: (message, context = {}) => log("error", message, { ...baseContext, ...context }),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

export const logger: Logger = createLogger({});

/**
 * Helper to log errors with full context
 */
export function logError(error: unknown, context: LogContext = {}): void {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    logger.error(error.message, { ...context, code, error });
  } else {
    logger.error("Unknown error", { ...context, error: String(error) });
  }
}
