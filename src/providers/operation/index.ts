export {
  OPERATION_BACKOFF,
  OPERATION_MAX_ATTEMPTS,
  OPERATION_RATE_LIMITS,
  operationFeedback,
} from "./rate-limits";
