/**
 * Rate limiter module exports.
 */

// Sliding window
export { createWindowCounter, type WindowCounter, type WindowSnapshot } from "./window-counter";

// Live limits
export {
  createLimitState,
  limitOverridesSchema,
  limitParametersSchema,
  parseLimitParameters,
  type LimitParameters,
  type LimitPatch,
  type LimitSnapshot,
  type LimitState,
  type LimitUpdateResult,
  type ReportedUsage,
} from "./limit-state";

// Proactive delay
export {
  DEFAULT_JITTER_FACTOR,
  getDelay,
  getThresholdCounts,
  type DelayDecision,
  type DelayMode,
} from "./delay-policy";

// Backoff utilities
export {
  createBackoffState,
  DEFAULT_BACKOFF_CONFIG,
  getBackoffCeilingMs,
  getStatusCode,
  isRetryableError,
  isRetryableStatusCode,
  nextBackoff,
  parseRetryAfterMs,
  RETRYABLE_STATUS_CODES,
  type BackoffConfig,
  type BackoffState,
  type BackoffStep,
} from "./backoff";

// Credential rotation
export {
  createCredentialRotator,
  type CredentialRotator,
  type CredentialSet,
  type RotationResult,
} from "./credential-rotator";

// Provider feedback
export {
  classifyError,
  createFeedbackHook,
  readLimitHeaders,
  toResponseLike,
  type CallOutcome,
  type FeedbackContext,
  type FeedbackStrategy,
  type FeedbackVerdict,
  type LimitFeedbackHook,
  type RateLimitHeaderNames,
  type ResponseLike,
} from "./feedback";

// Errors
export {
  CancelledError,
  CredentialsExhaustedError,
  FatalOperationError,
  InvalidThrottleConfigError,
  MaxRetriesExceededError,
  RateLimitedError,
  TransientError,
} from "./errors";

export { sleep } from "./sleep";

// Throttle executor (main entry point)
export {
  createThrottleExecutor,
  type Operation,
  type OperationContext,
  type RunOptions,
  type ThrottleExecutor,
  type ThrottleExecutorConfig,
  type ThrottleMetrics,
  type WindowScope,
} from "./throttle-executor";

// Non-HTTP clients
export { createOperationRunner, type OperationRunner } from "./operation-runner";
