/**
 * Error taxonomy for throttled operations.
 *
 * Only `TransientError` and `RateLimitedError` are recovered internally; every
 * other error thrown by an operation reaches the caller unchanged.
 */

/**
 * A failure expected to resolve itself on retry.
 * Operations may throw it to request a backoff retry.
 */
export class TransientError extends Error {
  public readonly retryAfterMs: number | undefined;

  constructor(message: string, options: { cause?: unknown; retryAfterMs?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransientError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * The active credential's budget is exhausted.
 */
export class RateLimitedError extends Error {
  public readonly retryAfterMs: number | undefined;

  constructor(message: string, options: { cause?: unknown; retryAfterMs?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Every configured credential has been rate limited.
 */
export class CredentialsExhaustedError extends Error {
  public readonly credentialCount: number;

  constructor(message: string, options: { credentialCount: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "CredentialsExhaustedError";
    this.credentialCount = options.credentialCount;
  }
}

/**
 * The caller abandoned the operation (aborted signal).
 */
export class CancelledError extends Error {
  constructor(message = "Operation cancelled", options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CancelledError";
  }
}

/**
 * A completed call whose result was classified as non-retryable
 * (for example a 404 response returned by `fetch`).
 */
export class FatalOperationError extends Error {
  public readonly result: unknown;

  constructor(message: string, options: { result: unknown }) {
    super(message);
    this.name = "FatalOperationError";
    this.result = options.result;
  }
}

/**
 * Error thrown when max attempts exceeded.
 */
export class MaxRetriesExceededError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message, { cause: lastError });
    this.name = "MaxRetriesExceededError";
  }
}

/**
 * Executor configuration failed validation.
 */
export class InvalidThrottleConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "InvalidThrottleConfigError";
  }
}
