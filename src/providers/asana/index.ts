export {
  ASANA_BACKOFF,
  ASANA_BASE_URL,
  ASANA_MAX_ATTEMPTS,
  ASANA_RATE_LIMITS,
  asanaFeedback,
} from "./rate-limits";
