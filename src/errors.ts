/**
 * Error taxonomy shared by the API layer, the history cache and the backfill.
 *
 * Retryable failures (rate limiting, server errors, timeouts, network drops)
 * all extend {@link RetryableApiError} so callers can catch one family.
 */

export type ErrorContext = Record<string, unknown>;

export class MeterfeedError extends Error {
  readonly code: string;
  readonly context?: ErrorContext;

  constructor(message: string, code = "METERFEED_ERROR", context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Bad credentials, a failed token exchange or a token the API keeps refusing. */
export class AuthError extends MeterfeedError {
  readonly status?: number;

  constructor(message: string, status?: number, context?: ErrorContext) {
    super(message, "AUTH_ERROR", { status, ...context });
    this.status = status;
  }
}

/** HTTP 429, 5xx or a request timeout. The caller decides on backoff. */
export class RetryableApiError extends MeterfeedError {
  readonly status?: number;

  constructor(message: string, status?: number, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, "RETRYABLE_API_ERROR", { status, ...context }, options);
    this.status = status;
  }
}

/** The request never produced an HTTP status (DNS, connection reset, ...). */
export class TransportError extends RetryableApiError {
  constructor(message: string, cause?: unknown, context?: ErrorContext) {
    super(message, undefined, context, { cause });
  }
}

/** A 4xx other than 401 and 429. Retrying will not help. */
export class FatalApiError extends MeterfeedError {
  readonly status: number;

  constructor(message: string, status: number, context?: ErrorContext) {
    super(message, "FATAL_API_ERROR", { status, ...context });
    this.status = status;
  }
}

export class StorageError extends MeterfeedError {
  constructor(message: string, operation: string, cause?: unknown, context?: ErrorContext) {
    super(message, "STORAGE_ERROR", { operation, ...context }, { cause });
  }
}

export class ValidationError extends MeterfeedError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "VALIDATION_ERROR", context);
  }
}

/** A poll cycle hit an error the host should show as a hard failure. */
export class UpdateFailedError extends MeterfeedError {
  constructor(message: string, cause: unknown, context?: ErrorContext) {
    super(message, "UPDATE_FAILED", context, { cause });
  }
}

export function isRetryable(error: unknown): error is RetryableApiError {
  return error instanceof RetryableApiError;
}

export function errMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
