/**
 * Defaults for throttling non-HTTP client calls (SDKs, database clients).
 *
 * Results are never inspected: only thrown errors are classified, and a
 * transient one backs off from a 10 second base.
 */

import { type BackoffConfig, type LimitParameters, createFeedbackHook } from "@/lib/rate-limiter";

export const OPERATION_RATE_LIMITS: LimitParameters = {
  maxOperationsInWindow: 10,
  rateLimitWindowMs: 1000,
  throttleStartPercentage: 0.75,
  fullThrottlePercentage: 0.9,
};

export const OPERATION_BACKOFF: BackoffConfig = {
  baseDelayMs: 10_000,
  multiplier: 2,
  maxDelayMs: 3_600_000,
};

export const OPERATION_MAX_ATTEMPTS = 3;

export const operationFeedback = createFeedbackHook({ kind: "fixed" });
