export {
  AIRTABLE_BACKOFF,
  AIRTABLE_BASE_URL,
  AIRTABLE_MAX_ATTEMPTS,
  AIRTABLE_PENALTY_MS,
  AIRTABLE_RATE_LIMITS,
  airtableFeedback,
} from "./rate-limits";
