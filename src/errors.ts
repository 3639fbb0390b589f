/**
 * Application error hierarchy.
 * Every error the engine raises on purpose carries a stable `code` so callers
 * can branch without string-matching messages.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

/** Feedback referenced a query id with no QueryRecord behind it. */
export class FeedbackForUnknownQueryError extends NotFoundError {
  constructor(readonly queryId: string) {
    super(`Query "${queryId}" not found`, { queryId });
  }
}

/** An embedding's length differs from the repo-wide dimension. */
export class EmbeddingDimensionError extends ValidationError {
  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`, {
      expected,
      actual,
    });
  }
}

export class EmbeddingProviderUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING_PROVIDER_UNAVAILABLE', message, describeCause(cause));
  }
}

export class BackendTimeoutError extends AppError {
  constructor(
    readonly backend: string,
    readonly timeoutMs: number
  ) {
    super('BACKEND_TIMEOUT', `${backend} did not respond within ${timeoutMs}ms`, {
      backend,
      timeoutMs,
    });
  }
}

export class BackendError extends AppError {
  constructor(
    readonly backend: string,
    message: string,
    cause?: unknown
  ) {
    super('BACKEND_ERROR', `${backend}: ${message}`, {
      backend,
      ...describeCause(cause),
    });
  }
}

function describeCause(cause: unknown): Record<string, unknown> | undefined {
  if (cause === undefined) return undefined;
  return { cause: cause instanceof Error ? cause.message : String(cause) };
}
