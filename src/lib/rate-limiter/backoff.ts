/**
 * Exponential backoff with full jitter for retrying transient failures.
 */

import { TransientError } from "./errors";

export interface BackoffConfig {
  /** Delay ceiling of the first retry (ms) */
  baseDelayMs: number;
  /** Multiplier for exponential growth */
  multiplier: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
}

export interface BackoffState {
  /** Retries already taken in this call */
  attempt: number;
  baseDelayMs: number;
}

export interface BackoffStep {
  delayMs: number;
  state: BackoffState;
}

/**
 * Default backoff configuration.
 * - Starts at 2 seconds
 * - Doubles each retry
 * - Caps at one hour
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: 2000,
  multiplier: 2,
  maxDelayMs: 3_600_000,
};

export const createBackoffState = (baseDelayMs: number): BackoffState => ({
  attempt: 0,
  baseDelayMs,
});

/**
 * Delay ceiling for an attempt, before jitter.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 *
 * @example
 * ```typescript
 * // 1000, 2000, 4000 with a 1s base
 * getBackoffCeilingMs(0, { ...DEFAULT_BACKOFF_CONFIG, baseDelayMs: 1000 });
 * getBackoffCeilingMs(1, { ...DEFAULT_BACKOFF_CONFIG, baseDelayMs: 1000 });
 * getBackoffCeilingMs(2, { ...DEFAULT_BACKOFF_CONFIG, baseDelayMs: 1000 });
 * ```
 */
export const getBackoffCeilingMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => Math.min(config.baseDelayMs * config.multiplier ** attempt, config.maxDelayMs);

/**
 * Computes the next retry delay and advances the state.
 *
 * Full jitter: the delay is sampled uniformly in [0, ceiling], which spreads
 * concurrent retries apart. An explicit `overrideDelayMs` (from Retry-After)
 * replaces the computed delay for this step only; the attempt still advances.
 */
export const nextBackoff = (
  state: BackoffState,
  config: Omit<BackoffConfig, "baseDelayMs"> = DEFAULT_BACKOFF_CONFIG,
  options: { random?: () => number; overrideDelayMs?: number } = {},
): BackoffStep => {
  const { random = Math.random, overrideDelayMs } = options;
  const nextState: BackoffState = { ...state, attempt: state.attempt + 1 };

  if (overrideDelayMs !== undefined) {
    return { delayMs: Math.max(0, overrideDelayMs), state: nextState };
  }

  const ceilingMs = getBackoffCeilingMs(state.attempt, { ...config, baseDelayMs: state.baseDelayMs });
  return { delayMs: Math.floor(random() * ceilingMs), state: nextState };
};

/**
 * Parses Retry-After header value.
 *
 * @param value - Header value (seconds as string, or HTTP date)
 * @returns Delay in milliseconds, or null if parsing fails
 *
 * @example
 * ```typescript
 * parseRetryAfterMs("30"); // 30000
 * parseRetryAfterMs("Wed, 21 Oct 2026 07:28:00 GMT"); // time until that date
 * ```
 */
export const parseRetryAfterMs = (value: string | null | undefined): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();

  // Only accept if the entire string is a valid non-negative integer
  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return seconds * 1000;
  }

  // RFC 1123, RFC 850 and asctime dates all go through Date.parse
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};

/**
 * HTTP status codes that indicate retryable errors.
 */
export const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * Checks if an HTTP status code is retryable.
 */
export const isRetryableStatusCode = (statusCode: number): boolean =>
  RETRYABLE_STATUS_CODES.has(statusCode) || (statusCode >= 500 && statusCode < 600);

/**
 * Extracts HTTP status code from an error object without type casts.
 */
export const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
};

/**
 * Network error codes that indicate retryable errors.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Error names that indicate a timed out request.
 */
const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError", "ConnectTimeoutError"]);

/**
 * Checks if an error is transient.
 *
 * Transient:
 * - TransientError instances
 * - 408, 429 and 5xx status on the error
 * - Network errors (ECONNRESET, ETIMEDOUT, etc.), also when wrapped as `cause`
 *   (undici's "fetch failed")
 * - Timeout errors
 *
 * Anything else is fatal: retrying an unknown failure risks duplicate side
 * effects.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (error instanceof TransientError) {
    return true;
  }

  if (error === null || typeof error !== "object") {
    return false;
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    return isRetryableStatusCode(statusCode);
  }

  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return true;
  }

  if ("name" in error && typeof error.name === "string" && TIMEOUT_ERROR_NAMES.has(error.name)) {
    return true;
  }

  if ("cause" in error && error.cause !== error) {
    return isRetryableError(error.cause);
  }

  return false;
};
