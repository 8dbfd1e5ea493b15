/**
 * Structured Logger
 *
 * Drop-in replacement for console.log/warn/error with:
 * - Structured entries (level, timestamp, module, message, context)
 * - Trace IDs picked up from async context (see trace.ts)
 * - Module-scoped child loggers via log.child("module-name")
 *
 * Usage:
 *   import { log } from "./logger.ts";
 *   const logger = log.child("pipeline");
 *   logger.info("Sync complete", { new: 3 });
 *   logger.error("Download failed", { voicemail_id: 12 }, err);
 */

import { getTraceId } from "./trace.ts";

// ── Types ────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  context?: Record<string, unknown>;
  trace_id?: string;
  voicemail_id?: number;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

export interface LogContext {
  trace_id?: string;
  voicemail_id?: number;
  [key: string]: unknown;
}

// ── Level ordering ───────────────────────────────────────────

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();
const LOG_LEVEL: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[LOG_LEVEL];
}

// ── Error serialization ──────────────────────────────────────

function serializeError(err: unknown): LogEntry["error"] | undefined {
  if (!err) return undefined;
  if (err instanceof Error) {
    return {
      message: err.message,
      stack: err.stack,
      name: err.name,
    };
  }
  if (typeof err === "string") {
    return { message: err };
  }
  return { message: String(err) };
}

function isLogContext(value: unknown): value is LogContext {
  return !!value && typeof value === "object" && !Array.isArray(value) && !(value instanceof Error);
}

// ── Core log function ────────────────────────────────────────

function emitLog(
  level: LogLevel,
  module: string,
  message: string,
  contextOrError?: unknown,
  maybeError?: unknown,
): void {
  if (!shouldLog(level)) return;

  // Parse arguments: (message, context, error) or (message, error) or (message)
  let context: LogContext | undefined;
  let error: unknown;

  if (isLogContext(contextOrError)) {
    context = contextOrError;
    error = maybeError;
  } else if (contextOrError !== undefined) {
    error = contextOrError;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    module,
    message,
  };

  const traceId = context?.trace_id || getTraceId();
  if (traceId) entry.trace_id = traceId;

  if (context) {
    if (typeof context.voicemail_id === "number") entry.voicemail_id = context.voicemail_id;

    const { trace_id: _t, ...rest } = context;
    if (Object.keys(rest).length > 0) entry.context = rest;
  }

  if (error) entry.error = serializeError(error);

  // Console output with bracket prefix
  const prefix = `[${module}]`;
  const traceStr = entry.trace_id ? ` [t:${entry.trace_id.slice(0, 8)}]` : "";
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
  const errorStr = entry.error ? ` ${entry.error.message}` : "";
  const line = `${prefix}${traceStr} ${message}${contextStr}${errorStr}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
    case "fatal":
      console.error(line);
      break;
  }
}

// ── Logger interface ─────────────────────────────────────────

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, contextOrError?: unknown, maybeError?: unknown): void;
  error(message: string, contextOrError?: unknown, maybeError?: unknown): void;
  fatal(message: string, contextOrError?: unknown, maybeError?: unknown): void;
  child(module: string): Logger;
}

function createLogger(module: string): Logger {
  return {
    debug: (msg, ctx?) => emitLog("debug", module, msg, ctx),
    info: (msg, ctx?) => emitLog("info", module, msg, ctx),
    warn: (msg, ctxOrErr?, err?) => emitLog("warn", module, msg, ctxOrErr, err),
    error: (msg, ctxOrErr?, err?) => emitLog("error", module, msg, ctxOrErr, err),
    fatal: (msg, ctxOrErr?, err?) => emitLog("fatal", module, msg, ctxOrErr, err),
    child: (childModule: string) => createLogger(childModule),
  };
}

/** Global logger. Use log.child("module") for module-scoped loggers. */
export const log = createLogger("relay");
