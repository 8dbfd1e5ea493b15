/**
 * Trace Context
 *
 * Generates and propagates trace IDs through the async call chain
 * using Node's AsyncLocalStorage. Pipeline ticks, webhook fast-path runs
 * and HTTP requests each run inside `withTraceAsync()`, so every log line
 * they produce carries the same trace ID without explicit threading.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

interface TraceContext {
  traceId: string;
}

const traceStore = new AsyncLocalStorage<TraceContext>();

/** Generate a short trace ID (16 hex chars). */
export function generateTraceId(): string {
  return randomBytes(8).toString("hex");
}

/** Get the current trace ID from async context (null if none active). */
export function getTraceId(): string | null {
  return traceStore.getStore()?.traceId ?? null;
}

/**
 * Run an async function within a trace context.
 * If a trace is already active, creates a nested context with a new ID.
 */
export async function withTraceAsync<T>(fn: () => Promise<T>, traceId?: string): Promise<T> {
  const id = traceId ?? generateTraceId();
  return traceStore.run({ traceId: id }, fn);
}
