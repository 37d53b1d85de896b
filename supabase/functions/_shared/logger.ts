/**
 * Structured Logging Module
 *
 * One JSON object per line with the active request context merged in.
 * Fields whose names look like credentials are redacted before output.
 */

import { getContext, getElapsedMs } from "./context.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string;
  requestId?: string;
  correlationId?: string;
  userEmail?: string;
  durationMs?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  [key: string]: unknown;
}

export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;
  /** Service name to include in all logs */
  service?: string;
  includeStackTrace: boolean;
  /** Field name fragments to redact */
  redactFields: string[];
  prettyPrint: boolean;
  /** Where formatted lines go; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_REDACT_FIELDS = [
  "password",
  "token",
  "apiKey",
  "api_key",
  "secret",
  "authorization",
  "service_role",
  "serviceRole",
];

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: "info",
  includeStackTrace: true,
  redactFields: DEFAULT_REDACT_FIELDS,
  prettyPrint: false,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function redactSensitive(value: unknown, depth = 0): unknown {
  if (depth > 8) return "[MAX_DEPTH]";
  if (value === null || value === undefined) return value;

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, depth + 1));
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      result[key] = config.redactFields.some((field) => lowerKey.includes(field.toLowerCase()))
        ? "[REDACTED]"
        : redactSensitive(nested, depth + 1);
    }
    return result;
  }

  return value;
}

function formatError(error: Error): LogEntry["error"] {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: config.includeStackTrace ? error.stack : undefined,
    code,
  };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[config.minLevel];
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
): LogEntry {
  const ctx = getContext();

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service: config.service || ctx?.service,
    requestId: ctx?.requestId,
    correlationId: ctx?.correlationId,
    userEmail: ctx?.userEmail,
    durationMs: ctx ? getElapsedMs() : undefined,
  };

  if (data) {
    const redacted = redactSensitive(data);
    if (redacted && typeof redacted === "object") {
      Object.assign(entry, redacted);
    }
  }

  for (const key of Object.keys(entry)) {
    if (entry[key] === undefined) {
      delete entry[key];
    }
  }

  return entry;
}

function output(entry: LogEntry): void {
  const line = config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);

  if (config.sink) {
    config.sink(entry.level, line);
    return;
  }

  switch (entry.level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  output(createLogEntry(level, message, data));
}

export function debug(message: string, data?: Record<string, unknown>): void {
  write("debug", message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  write("info", message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  write("warn", message, data);
}

/**
 * Log at error level. Accepts an Error (serialized with stack) or plain data.
 */
export function error(
  message: string,
  errorOrData?: unknown,
  data?: Record<string, unknown>,
): void {
  let logData: Record<string, unknown> = { ...data };
  if (errorOrData instanceof Error) {
    logData = { ...logData, error: formatError(errorOrData) };
  } else if (errorOrData !== undefined && errorOrData !== null) {
    logData = typeof errorOrData === "object"
      ? { ...errorOrData, ...logData }
      : { ...logData, error: { name: "UnknownError", message: String(errorOrData) } };
  }
  write("error", message, logData);
}

export function logResponse(statusCode: number, data?: Record<string, unknown>): void {
  const level = statusCode >= 500 ? "error" : statusCode >= 400 ? "warn" : "info";
  const message = statusCode >= 400 ? "Request failed" : "Request completed";
  write(level, message, { statusCode, ...data });
}

/**
 * Log with timing; returns a function to call when the operation finishes.
 *
 * @example
 * ```typescript
 * const done = logger.time("statistics query");
 * const facts = await ledger.listFacts(email, since);
 * done({ rows: facts.length });
 * ```
 */
export function time(operation: string): (data?: Record<string, unknown>) => void {
  const start = performance.now();
  return (data?: Record<string, unknown>) => {
    const durationMs = Math.round(performance.now() - start);
    debug(`${operation} completed`, { operation, operationDurationMs: durationMs, ...data });
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  time,
  logResponse,
  configure: configureLogger,
};

export default logger;
