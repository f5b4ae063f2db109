/**
 * Defaults for an arbitrary HTTP API with no published limits.
 *
 * - 10 requests per second
 * - Throttling starts at 75%, full throttle at 90%
 * - Retry-After honoured on 408/429/5xx and on 403 when present
 */

import { type BackoffConfig, type LimitParameters, createFeedbackHook } from "@/lib/rate-limiter";

export const GENERIC_RATE_LIMITS: LimitParameters = {
  maxOperationsInWindow: 10,
  rateLimitWindowMs: 1000,
  throttleStartPercentage: 0.75,
  fullThrottlePercentage: 0.9,
};

export const GENERIC_BACKOFF: BackoffConfig = {
  baseDelayMs: 2000,
  multiplier: 2,
  maxDelayMs: 3_600_000,
};

export const GENERIC_MAX_ATTEMPTS = 3;

export const genericFeedback = (rotateOnRateLimit = false) =>
  createFeedbackHook({ kind: "retry-after", rotateOnRateLimit });
