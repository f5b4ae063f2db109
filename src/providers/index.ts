/**
 * Provider throttler exports.
 */

export type {
  HttpProviderName,
  HttpProviderThrottler,
  OperationProviderThrottler,
  ProviderThrottler,
  ProviderThrottlerOptions,
} from "./types";

// Factory function
export { createProviderThrottler } from "./factory";

// Config validation
export {
  isProviderConfig,
  parseProviderConfig,
  providerConfigFromEnv,
  ProviderConfigSchema,
} from "./config";
export type { ProviderConfig, ProviderName } from "./config";

// Provider-specific rate limit configurations
export { GENERIC_BACKOFF, GENERIC_RATE_LIMITS } from "./generic";
export { AIRTABLE_BASE_URL, AIRTABLE_PENALTY_MS, AIRTABLE_RATE_LIMITS } from "./airtable";
export { ASANA_BASE_URL, ASANA_RATE_LIMITS } from "./asana";
export { HUBSPOT_BASE_URL, HUBSPOT_RATE_LIMIT_HEADERS, HUBSPOT_RATE_LIMITS } from "./hubspot";
export { SLACK_BASE_URL, SLACK_RATE_LIMITS } from "./slack";
export { OPERATION_BACKOFF, OPERATION_RATE_LIMITS } from "./operation";
