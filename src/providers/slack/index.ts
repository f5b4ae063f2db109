export {
  SLACK_BACKOFF,
  SLACK_BASE_URL,
  SLACK_MAX_ATTEMPTS,
  SLACK_RATE_LIMITS,
} from "./rate-limits";
