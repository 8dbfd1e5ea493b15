/**
 * Resilience utilities: retry with exponential backoff and
 * transient-error classification for remote calls.
 */

import { log } from "./logger.ts";

const logger = log.child("resilience");

// ── Error types ─────────────────────────────────────────────

/** A remote HTTP call that came back with a non-2xx status. */
export class RemoteHttpError extends Error {
  constructor(
    public service: string,
    public status: number,
    public body: string,
  ) {
    super(`${service} returned ${status}: ${body.substring(0, 200)}`);
    this.name = "RemoteHttpError";
  }
}

// ── Retry with Exponential Backoff ──────────────────────────

export interface RetryOpts {
  maxRetries?: number;      // default: 3
  baseDelayMs?: number;     // default: 500ms
  maxDelayMs?: number;      // default: 10s
  retryOn?: (err: unknown) => boolean;  // default: retry on all errors
  label?: string;
}

/**
 * Retry a function with exponential backoff.
 * Delay doubles each attempt: 500ms, 1s, 2s, 4s... capped at maxDelayMs.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: RetryOpts,
): Promise<T> {
  const maxRetries = opts?.maxRetries ?? 3;
  const baseDelay = opts?.baseDelayMs ?? 500;
  const maxDelay = opts?.maxDelayMs ?? 10_000;
  const shouldRetry = opts?.retryOn ?? (() => true);

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt >= maxRetries || !shouldRetry(err)) {
        throw err;
      }
      const delay = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
      logger.warn("Retrying after failure", { label: opts?.label, attempt: attempt + 1, delayMs: delay }, err);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
  throw lastError;
}

/**
 * Check if an error is transient (worth retrying).
 * Retries on: 429, 5xx, timeouts, network errors.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof RemoteHttpError) {
    return err.status === 429 || err.status >= 500;
  }
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") return true;
    const msg = err.message.toLowerCase();
    return msg.includes("fetch failed") || msg.includes("econnrefused") ||
      msg.includes("econnreset") || msg.includes("etimedout") ||
      msg.includes("enetunreach") || msg.includes("socket hang up");
  }
  return false;
}

/** Short message for storing in status trails and error columns. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
