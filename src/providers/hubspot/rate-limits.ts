/**
 * HubSpot API rate limit configuration.
 *
 * @see https://developers.hubspot.com/docs/api/usage-details
 *
 * - 160 requests per 10 seconds per private app token (starter default)
 * - Every response reports the live window through rate-limit headers, so
 *   the server's own usage count drives throttling
 * - 429 rotates to a backup token
 */

import { type BackoffConfig, type LimitParameters, createFeedbackHook } from "@/lib/rate-limiter";

export const HUBSPOT_BASE_URL = "https://api.hubapi.com/";

export const HUBSPOT_RATE_LIMITS: LimitParameters = {
  maxOperationsInWindow: 160,
  rateLimitWindowMs: 10_000,
  throttleStartPercentage: 0.75,
  fullThrottlePercentage: 0.9,
};

export const HUBSPOT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  multiplier: 3,
  maxDelayMs: 3_600_000,
};

export const HUBSPOT_MAX_ATTEMPTS = 4;

export const HUBSPOT_RATE_LIMIT_HEADERS = {
  limit: "X-HubSpot-RateLimit-Max",
  remaining: "X-HubSpot-RateLimit-Remaining",
  intervalMs: "X-HubSpot-RateLimit-Interval-Milliseconds",
} as const;

export const hubspotFeedback = createFeedbackHook({
  kind: "headers",
  rotateOnRateLimit: true,
  headers: HUBSPOT_RATE_LIMIT_HEADERS,
});
