export {
  HUBSPOT_BACKOFF,
  HUBSPOT_BASE_URL,
  HUBSPOT_MAX_ATTEMPTS,
  HUBSPOT_RATE_LIMIT_HEADERS,
  HUBSPOT_RATE_LIMITS,
  hubspotFeedback,
} from "./rate-limits";
