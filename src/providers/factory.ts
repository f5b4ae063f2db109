/**
 * Factory function for creating provider throttlers.
 *
 * Each provider is the core executor composed with a preset: limits, backoff,
 * attempt ceiling and a feedback strategy. Config-level overrides are merged
 * over the preset and validated again by the executor.
 */

import { bearerAuthorization, createThrottledHttpClient } from "@/lib/http";
import {
  type BackoffConfig,
  type CredentialSet,
  type LimitFeedbackHook,
  type LimitParameters,
  type WindowScope,
  createOperationRunner,
  createThrottleExecutor,
} from "@/lib/rate-limiter";

import {
  AIRTABLE_BACKOFF,
  AIRTABLE_BASE_URL,
  AIRTABLE_MAX_ATTEMPTS,
  AIRTABLE_RATE_LIMITS,
  airtableFeedback,
} from "./airtable";
import {
  ASANA_BACKOFF,
  ASANA_BASE_URL,
  ASANA_MAX_ATTEMPTS,
  ASANA_RATE_LIMITS,
  asanaFeedback,
} from "./asana";
import type { ProviderConfig } from "./config";
import {
  GENERIC_BACKOFF,
  GENERIC_MAX_ATTEMPTS,
  GENERIC_RATE_LIMITS,
  genericFeedback,
} from "./generic";
import {
  HUBSPOT_BACKOFF,
  HUBSPOT_BASE_URL,
  HUBSPOT_MAX_ATTEMPTS,
  HUBSPOT_RATE_LIMITS,
  hubspotFeedback,
} from "./hubspot";
import {
  OPERATION_BACKOFF,
  OPERATION_MAX_ATTEMPTS,
  OPERATION_RATE_LIMITS,
  operationFeedback,
} from "./operation";
import { SLACK_BACKOFF, SLACK_BASE_URL, SLACK_MAX_ATTEMPTS, SLACK_RATE_LIMITS } from "./slack";
import type {
  HttpProviderName,
  HttpProviderThrottler,
  ProviderThrottler,
  ProviderThrottlerOptions,
} from "./types";

interface HttpPreset {
  provider: HttpProviderName;
  limits: LimitParameters;
  backoff: BackoffConfig;
  maxAttempts: number;
  feedback: LimitFeedbackHook;
  baseUrl?: string;
  credentials?: CredentialSet<string>;
}

interface PresetOverrides {
  limits?: Partial<LimitParameters>;
  maxAttempts?: number;
  windowScope?: WindowScope;
}

const createHttpThrottler = (
  preset: HttpPreset,
  overrides: PresetOverrides,
  options: ProviderThrottlerOptions,
): HttpProviderThrottler => {
  const executor = createThrottleExecutor<string>({
    name: preset.provider,
    limits: { ...preset.limits, ...overrides.limits },
    backoff: preset.backoff,
    maxAttempts: overrides.maxAttempts ?? preset.maxAttempts,
    windowScope: overrides.windowScope,
    credentials: preset.credentials,
    feedback: preset.feedback,
    refreshCredential: options.refreshCredential,
    isTransient: options.isTransient,
    logger: options.logger,
  });

  return {
    provider: preset.provider,
    executor,
    http: createThrottledHttpClient({
      executor,
      baseUrl: preset.baseUrl,
      authorize: bearerAuthorization,
      fetch: options.fetch,
    }),
  };
};

/**
 * Create a provider throttler based on configuration.
 *
 * @param config - Validated provider configuration
 * @param options - Logger, fetch and credential refresh hooks
 *
 * @example
 * ```typescript
 * const hubspot = createProviderThrottler(
 *   parseProviderConfig({ provider: "hubspot", apiKey: "key-a", backupApiKeys: ["key-b"] }),
 *   { logger },
 * );
 * if (hubspot.provider !== "operation") {
 *   const response = await hubspot.http.get("crm/v3/objects/contacts", { params: { limit: 10 } });
 * }
 * ```
 */
export const createProviderThrottler = (
  config: ProviderConfig,
  options: ProviderThrottlerOptions = {},
): ProviderThrottler => {
  switch (config.provider) {
    case "generic":
      return createHttpThrottler(
        {
          provider: "generic",
          limits: GENERIC_RATE_LIMITS,
          backoff: GENERIC_BACKOFF,
          maxAttempts: GENERIC_MAX_ATTEMPTS,
          feedback: genericFeedback(config.rotateOnRateLimit),
          baseUrl: config.baseUrl,
          credentials: config.apiKey
            ? { primary: config.apiKey, backups: config.backupApiKeys }
            : undefined,
        },
        config,
        options,
      );
    case "airtable":
      return createHttpThrottler(
        {
          provider: "airtable",
          limits: AIRTABLE_RATE_LIMITS,
          backoff: AIRTABLE_BACKOFF,
          maxAttempts: AIRTABLE_MAX_ATTEMPTS,
          feedback: airtableFeedback,
          baseUrl: AIRTABLE_BASE_URL,
          credentials: { primary: config.apiKey },
        },
        config,
        options,
      );
    case "asana":
      return createHttpThrottler(
        {
          provider: "asana",
          limits: ASANA_RATE_LIMITS,
          backoff: ASANA_BACKOFF,
          maxAttempts: ASANA_MAX_ATTEMPTS,
          feedback: asanaFeedback,
          baseUrl: ASANA_BASE_URL,
          credentials: { primary: config.apiKey, backups: config.backupApiKeys },
        },
        config,
        options,
      );
    case "hubspot":
      return createHttpThrottler(
        {
          provider: "hubspot",
          limits: HUBSPOT_RATE_LIMITS,
          backoff: HUBSPOT_BACKOFF,
          maxAttempts: HUBSPOT_MAX_ATTEMPTS,
          feedback: hubspotFeedback,
          baseUrl: HUBSPOT_BASE_URL,
          credentials: { primary: config.apiKey, backups: config.backupApiKeys },
        },
        config,
        options,
      );
    case "slack":
      return createHttpThrottler(
        {
          provider: "slack",
          limits: SLACK_RATE_LIMITS,
          backoff: SLACK_BACKOFF,
          maxAttempts: SLACK_MAX_ATTEMPTS,
          feedback: genericFeedback(),
          baseUrl: SLACK_BASE_URL,
          credentials: { primary: config.botToken },
        },
        config,
        options,
      );
    case "operation": {
      const executor = createThrottleExecutor({
        name: "operation",
        limits: { ...OPERATION_RATE_LIMITS, ...config.limits },
        backoff: OPERATION_BACKOFF,
        maxAttempts: config.maxAttempts ?? OPERATION_MAX_ATTEMPTS,
        windowScope: config.windowScope,
        feedback: operationFeedback,
        isTransient: options.isTransient,
        logger: options.logger,
      });
      return { provider: "operation", executor, runner: createOperationRunner(executor) };
    }
  }
};
