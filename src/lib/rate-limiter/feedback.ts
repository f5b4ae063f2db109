/**
 * Limit feedback hooks.
 *
 * A hook inspects a finished call (returned value or thrown error) and tells
 * the executor what happened: success, a transient failure, an exhausted
 * credential, or a fatal result. It may also report new limits discovered from
 * the response. Provider behavior is selected by a tagged strategy instead of
 * per-provider subclasses.
 */

import { getStatusCode, isRetryableStatusCode, parseRetryAfterMs } from "./backoff";
import { RateLimitedError, TransientError } from "./errors";
import type { LimitPatch } from "./limit-state";

export type CallOutcome<T = unknown> =
  | { ok: true; result: T; completedAt: number }
  | { ok: false; error: unknown; completedAt: number };

export type FeedbackVerdict =
  | { kind: "ok"; limits?: LimitPatch }
  | { kind: "transient"; retryAfterMs?: number; limits?: LimitPatch }
  | { kind: "rate_limited"; retryAfterMs?: number; limits?: LimitPatch }
  | { kind: "fatal"; limits?: LimitPatch };

export interface FeedbackContext {
  /** Transient-error predicate configured on the executor */
  isTransient: (error: unknown) => boolean;
}

export type LimitFeedbackHook = (outcome: CallOutcome, context: FeedbackContext) => FeedbackVerdict;

export interface RateLimitHeaderNames {
  /** Maximum operations per window */
  limit?: string;
  /** Operations left in the current window */
  remaining?: string;
  /** Window length in milliseconds */
  intervalMs?: string;
  /** Window length in seconds */
  intervalSeconds?: string;
}

interface StrategyBase {
  /** Treat 429 as "credential exhausted, rotate" instead of a transient error */
  rotateOnRateLimit?: boolean;
}

export type FeedbackStrategy =
  | ({ kind: "fixed" } & StrategyBase)
  | ({ kind: "retry-after"; fallbackWaitMs?: number } & StrategyBase)
  | ({ kind: "headers"; headers: RateLimitHeaderNames; fallbackWaitMs?: number } & StrategyBase);

export interface ResponseLike {
  status: number;
  header: (name: string) => string | null;
}

const hasGetter = (value: object): value is { get: (name: string) => unknown } =>
  "get" in value && typeof value.get === "function";

/**
 * Reads headers from a fetch `Headers` object or a plain record.
 */
const createHeaderReader = (headers: unknown): ((name: string) => string | null) => {
  if (headers === null || typeof headers !== "object") {
    return () => null;
  }
  if (hasGetter(headers)) {
    return (name) => {
      const value = headers.get(name);
      return typeof value === "string" ? value : null;
    };
  }
  const entries = new Map<string, string>();
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      entries.set(key.toLowerCase(), value);
    } else if (Array.isArray(value) && typeof value[0] === "string") {
      entries.set(key.toLowerCase(), value[0]);
    }
  }
  return (name) => entries.get(name.toLowerCase()) ?? null;
};

/**
 * Views a value as an HTTP response if it carries a status code.
 * Works for fetch responses and for thrown errors shaped like `{ status, headers }`
 * or `{ response: { status, headers } }`.
 */
export const toResponseLike = (value: unknown): ResponseLike | null => {
  if (value === null || typeof value !== "object") {
    return null;
  }
  const status = getStatusCode(value);
  if (status !== undefined) {
    const headers = "headers" in value ? value.headers : undefined;
    return { status, header: createHeaderReader(headers) };
  }
  if ("response" in value && value.response !== value) {
    return toResponseLike(value.response);
  }
  return null;
};

const parseNumberHeader = (value: string | null): number | undefined => {
  if (value === null || !/^\d+(\.\d+)?$/.test(value.trim())) {
    return undefined;
  }
  return Number(value);
};

/**
 * Derives limit updates from rate-limit headers.
 *
 * The server's view of usage (`limit - remaining`) is recorded as reported
 * usage stamped with the call's completion time, so replaying the same
 * response yields the same patch.
 */
export const readLimitHeaders = (
  response: ResponseLike,
  names: RateLimitHeaderNames,
  completedAt: number,
): LimitPatch | undefined => {
  const patch: LimitPatch = {};

  const read = (name: string | undefined): number | undefined =>
    name ? parseNumberHeader(response.header(name)) : undefined;

  const limit = read(names.limit);
  const remaining = read(names.remaining);
  const intervalMs = read(names.intervalMs);
  const intervalSeconds = read(names.intervalSeconds);

  if (limit !== undefined && Number.isInteger(limit) && limit > 0) {
    patch.maxOperationsInWindow = limit;
  }
  if (intervalMs !== undefined && intervalMs > 0) {
    patch.rateLimitWindowMs = intervalMs;
  } else if (intervalSeconds !== undefined && intervalSeconds > 0) {
    patch.rateLimitWindowMs = intervalSeconds * 1000;
  }
  if (limit !== undefined && remaining !== undefined && Number.isInteger(remaining)) {
    patch.reportedUsage = { used: Math.max(0, limit - remaining), observedAt: completedAt };
  }

  return Object.keys(patch).length > 0 ? patch : undefined;
};

const withLimits = <V extends FeedbackVerdict>(verdict: V, limits: LimitPatch | undefined): V =>
  limits ? { ...verdict, limits } : verdict;

/**
 * Classifies a thrown error that is not an HTTP response.
 */
export const classifyError = (error: unknown, context: FeedbackContext): FeedbackVerdict => {
  if (error instanceof RateLimitedError) {
    return error.retryAfterMs === undefined
      ? { kind: "rate_limited" }
      : { kind: "rate_limited", retryAfterMs: error.retryAfterMs };
  }
  if (error instanceof TransientError) {
    return error.retryAfterMs === undefined
      ? { kind: "transient" }
      : { kind: "transient", retryAfterMs: error.retryAfterMs };
  }
  return context.isTransient(error) ? { kind: "transient" } : { kind: "fatal" };
};

const classifyResponse = (
  response: ResponseLike,
  strategy: FeedbackStrategy,
  completedAt: number,
): FeedbackVerdict => {
  const limits =
    strategy.kind === "headers" ? readLimitHeaders(response, strategy.headers, completedAt) : undefined;
  const { status } = response;

  if (status < 400) {
    return withLimits({ kind: "ok" }, limits);
  }

  const retryAfterMs =
    strategy.kind === "fixed" ? null : parseRetryAfterMs(response.header("retry-after"));
  const fallbackWaitMs = strategy.kind === "fixed" ? undefined : strategy.fallbackWaitMs;

  if (status === 429) {
    const waitMs = retryAfterMs ?? fallbackWaitMs;
    const kind = strategy.rotateOnRateLimit ? "rate_limited" : "transient";
    return withLimits(waitMs === undefined ? { kind } : { kind, retryAfterMs: waitMs }, limits);
  }

  // A 403 carrying Retry-After is a temporary block rather than a permission error
  if (isRetryableStatusCode(status) || (status === 403 && retryAfterMs !== null)) {
    return withLimits(
      retryAfterMs === null ? { kind: "transient" } : { kind: "transient", retryAfterMs },
      limits,
    );
  }

  return withLimits({ kind: "fatal" }, limits);
};

/**
 * Builds a feedback hook from a strategy.
 *
 * @example
 * ```typescript
 * const hubspotFeedback = createFeedbackHook({
 *   kind: "headers",
 *   rotateOnRateLimit: true,
 *   headers: {
 *     limit: "X-HubSpot-RateLimit-Max",
 *     remaining: "X-HubSpot-RateLimit-Remaining",
 *     intervalMs: "X-HubSpot-RateLimit-Interval-Milliseconds",
 *   },
 * });
 * ```
 */
export const createFeedbackHook =
  (strategy: FeedbackStrategy): LimitFeedbackHook =>
  (outcome, context) => {
    if (outcome.ok) {
      const response = toResponseLike(outcome.result);
      return response ? classifyResponse(response, strategy, outcome.completedAt) : { kind: "ok" };
    }

    if (outcome.error instanceof RateLimitedError || outcome.error instanceof TransientError) {
      return classifyError(outcome.error, context);
    }

    const response = toResponseLike(outcome.error);
    if (response) {
      const verdict = classifyResponse(response, strategy, outcome.completedAt);
      if (verdict.kind === "rate_limited") {
        return verdict;
      }
      // The status only supplies Retry-After and limits; the predicate decides retries
      if (!context.isTransient(outcome.error)) {
        return withLimits({ kind: "fatal" }, verdict.limits);
      }
      return verdict.kind === "transient"
        ? verdict
        : withLimits({ kind: "transient" }, verdict.limits);
    }

    return classifyError(outcome.error, context);
  };
