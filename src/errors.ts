// ── Error Taxonomy ───────────────────────────────────────

export type ErrorCode =
  | "EMBEDDING_UNAVAILABLE"
  | "DIMENSION_MISMATCH"
  | "MODEL_STREAM_FAILED"
  | "MODEL_STREAM_CANCELLED"
  | "STORE_UNAVAILABLE"
  | "NOT_FOUND"
  | "VALIDATION_FAILED"
  | "INTERNAL";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = "INTERNAL",
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** The embedding service failed or timed out. Callers degrade. */
export class EmbeddingUnavailableError extends AppError {
  constructor(message = "Embedding service unavailable", cause?: unknown) {
    super(message, "EMBEDDING_UNAVAILABLE", 503);
    if (cause !== undefined) this.cause = cause;
  }
}

/** Vectors of different lengths met. Configuration error; never retried. */
export class DimensionMismatchError extends AppError {
  constructor(expected: number, actual: number) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      "DIMENSION_MISMATCH",
      500,
      { expected, actual },
    );
  }
}

export class ModelStreamFailedError extends AppError {
  constructor(message = "Model stream failed", cause?: unknown) {
    super(message, "MODEL_STREAM_FAILED", 502);
    if (cause !== undefined) this.cause = cause;
  }
}

export type CancelReason = "cancelled" | "timeout";

export class ModelStreamCancelledError extends AppError {
  constructor(public readonly reason: CancelReason) {
    super(
      reason === "timeout"
        ? "Model stream exceeded its deadline"
        : "Model stream cancelled by caller",
      "MODEL_STREAM_CANCELLED",
      reason === "timeout" ? 504 : 499,
      { reason },
    );
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = "Memory store unavailable", cause?: unknown) {
    super(message, "STORE_UNAVAILABLE", 503);
    if (cause !== undefined) this.cause = cause;
  }
}

export class NotFoundError extends AppError {
  constructor(what: string, id: string) {
    super(`${what} ${id} not found`, "NOT_FOUND", 404, { id });
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_FAILED", 400);
  }
}

// ── Helpers ──────────────────────────────────────────────

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const wrapped = new AppError(message);
  wrapped.cause = err;
  return wrapped;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
