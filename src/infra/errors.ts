export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", 500);
    this.name = "ConfigError";
  }
}

/** Non-retryable rejection from a message source (bad request, not found). */
export class SourceError extends AppError {
  readonly source: string;

  constructor(message: string, source: string, statusCode = 502) {
    super(`[${source}] ${message}`, "SOURCE_ERROR", statusCode);
    this.name = "SourceError";
    this.source = source;
  }
}

/** Network failure, timeout, 429 or 5xx. Retried with backoff. */
export class TransientProviderError extends AppError {
  readonly source: string;
  readonly status?: number;

  constructor(message: string, source: string, status?: number) {
    super(`[${source}] ${message}`, "TRANSIENT_PROVIDER_ERROR", 503);
    this.name = "TransientProviderError";
    this.source = source;
    this.status = status;
  }
}

/** Missing or rejected credentials. Permanent for the process lifetime. */
export class AuthenticationError extends AppError {
  readonly source: string;

  constructor(message: string, source: string) {
    super(`[${source}] ${message}`, "AUTHENTICATION_ERROR", 401);
    this.name = "AuthenticationError";
    this.source = source;
  }
}

export class RateLimitExceededError extends AppError {
  readonly source: string;
  readonly retryAt: number;

  constructor(source: string, retryAt: number) {
    super(
      `[${source}] Rate limit exhausted until ${new Date(retryAt).toISOString()}`,
      "RATE_LIMIT_EXCEEDED",
      429,
    );
    this.name = "RateLimitExceededError";
    this.source = source;
    this.retryAt = retryAt;
  }
}

export class TimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT", 504);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_ERROR", 500);
    this.name = "PersistenceError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** A lifecycle move the state machine does not allow (backward or terminal to terminal). */
export class InvalidTransitionError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_TRANSITION", 409);
    this.name = "InvalidTransitionError";
  }
}

export class GenerationError extends AppError {
  constructor(message: string) {
    super(message, "GENERATION_ERROR", 502);
    this.name = "GenerationError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}

/** One-line form for operator-facing text and state snapshots. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
