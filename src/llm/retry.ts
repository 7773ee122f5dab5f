// ── Retry with Exponential Backoff ───────────────────────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000): doubles each retry */
  baseDelayMs?: number;
  /** Which HTTP status codes should trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "embed", "chat stream") */
  label?: string;
  /** Stops retrying (and waiting) as soon as it fires */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1000,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "API call",
};

/**
 * Wraps an async function with exponential backoff retry logic.
 * Only retries on network errors or HTTP status codes in the retryable list,
 * and never after the signal has aborted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };
  const signal = opts.signal;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (signal?.aborted || !isRetryable(error, retryableStatuses)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying API call",
      );
      await sleep(delayMs, signal);
      if (signal?.aborted) throw error;
    }
  }

  throw lastError;
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(
  error: unknown,
  retryableStatuses: number[] = DEFAULT_OPTIONS.retryableStatuses,
): boolean {
  // Network errors (fetch failures, resets, timeouts)
  if (error instanceof TypeError) return true;
  if (error instanceof Error && error.message.includes("ECONNRESET"))
    return true;
  if (error instanceof Error && error.message.includes("ETIMEDOUT"))
    return true;

  const status = getStatusCode(error);
  if (status && retryableStatuses.includes(status)) return true;

  return false;
}

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  // OpenAI SDK errors carry `status`, Pinecone and http errors `statusCode`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
