export {
  GENERIC_BACKOFF,
  GENERIC_MAX_ATTEMPTS,
  GENERIC_RATE_LIMITS,
  genericFeedback,
} from "./rate-limits";
