/**
 * Slack Web API rate limit configuration.
 *
 * @see https://api.slack.com/docs/rate-limits
 *
 * Tiers differ per method; the defaults match the generic preset and callers
 * override `limits` for the tier they use. 429 responses carry Retry-After.
 */

import type { LimitParameters } from "@/lib/rate-limiter";

import { GENERIC_BACKOFF, GENERIC_MAX_ATTEMPTS, GENERIC_RATE_LIMITS } from "../generic";

export const SLACK_BASE_URL = "https://slack.com/api/";

export const SLACK_RATE_LIMITS: LimitParameters = { ...GENERIC_RATE_LIMITS };

export const SLACK_BACKOFF = GENERIC_BACKOFF;

export const SLACK_MAX_ATTEMPTS = GENERIC_MAX_ATTEMPTS;
