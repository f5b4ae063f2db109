/**
 * Airtable API rate limit configuration.
 *
 * @see https://airtable.com/developers/web/api/rate-limits
 *
 * - 5 requests per second per base
 * - A 429 locks the base out for 30 seconds, announced or not
 */

import { type BackoffConfig, type LimitParameters, createFeedbackHook } from "@/lib/rate-limiter";

export const AIRTABLE_BASE_URL = "https://api.airtable.com/v0/";

export const AIRTABLE_RATE_LIMITS: LimitParameters = {
  maxOperationsInWindow: 5,
  rateLimitWindowMs: 1000,
  throttleStartPercentage: 0.5,
  fullThrottlePercentage: 0.7,
};

export const AIRTABLE_BACKOFF: BackoffConfig = {
  baseDelayMs: 2000,
  multiplier: 2,
  maxDelayMs: 3_600_000,
};

export const AIRTABLE_MAX_ATTEMPTS = 3;

/** Lockout after a 429 without Retry-After */
export const AIRTABLE_PENALTY_MS = 30_000;

export const airtableFeedback = createFeedbackHook({
  kind: "retry-after",
  fallbackWaitMs: AIRTABLE_PENALTY_MS,
});
