/**
 * Asana API rate limit configuration.
 *
 * @see https://developers.asana.com/docs/rate-limits
 *
 * - 1500 requests per minute per token (paid workspaces)
 * - 429 responses carry Retry-After; a rate-limited token rotates to a backup
 */

import { type BackoffConfig, type LimitParameters, createFeedbackHook } from "@/lib/rate-limiter";

export const ASANA_BASE_URL = "https://app.asana.com/api/1.0/";

export const ASANA_RATE_LIMITS: LimitParameters = {
  maxOperationsInWindow: 1500,
  rateLimitWindowMs: 60_000,
  throttleStartPercentage: 0.75,
  fullThrottlePercentage: 0.9,
};

export const ASANA_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 3_600_000,
};

export const ASANA_MAX_ATTEMPTS = 3;

export const asanaFeedback = createFeedbackHook({
  kind: "retry-after",
  rotateOnRateLimit: true,
});
