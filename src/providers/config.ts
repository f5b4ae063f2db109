/**
 * Provider configuration validation schemas.
 */

import * as v from "valibot";

import { type Config, getConfig } from "@/lib/config";
import { limitOverridesSchema } from "@/lib/rate-limiter";

const apiKeySchema = v.pipe(v.string(), v.minLength(1));

const backupKeysSchema = v.optional(v.array(apiKeySchema), []);

/** Tuning shared by every provider */
const overrideEntries = {
  limits: v.optional(limitOverridesSchema),
  maxAttempts: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1))),
  windowScope: v.optional(v.picklist(["per-credential", "shared"])),
};

export const ProviderConfigSchema = v.variant("provider", [
  v.object({
    provider: v.literal("generic"),
    baseUrl: v.optional(v.pipe(v.string(), v.url())),
    apiKey: v.optional(apiKeySchema),
    backupApiKeys: backupKeysSchema,
    rotateOnRateLimit: v.optional(v.boolean(), false),
    ...overrideEntries,
  }),
  v.object({
    provider: v.literal("airtable"),
    apiKey: apiKeySchema,
    ...overrideEntries,
  }),
  v.object({
    provider: v.literal("asana"),
    apiKey: apiKeySchema,
    backupApiKeys: backupKeysSchema,
    ...overrideEntries,
  }),
  v.object({
    provider: v.literal("hubspot"),
    apiKey: apiKeySchema,
    backupApiKeys: backupKeysSchema,
    ...overrideEntries,
  }),
  v.object({
    provider: v.literal("slack"),
    botToken: apiKeySchema,
    ...overrideEntries,
  }),
  v.object({
    provider: v.literal("operation"),
    ...overrideEntries,
  }),
]);

export type ProviderConfig = v.InferOutput<typeof ProviderConfigSchema>;

export type ProviderName = ProviderConfig["provider"];

export const parseProviderConfig = (config: unknown): ProviderConfig =>
  v.parse(ProviderConfigSchema, config);

export const isProviderConfig = (value: unknown): value is ProviderConfig =>
  v.is(ProviderConfigSchema, value);

/**
 * Builds a validated provider config from the environment credentials.
 * Throws a ValiError when a required key is missing.
 *
 * @example
 * ```typescript
 * // HUBSPOT_API_KEY=key-a HUBSPOT_BACKUP_API_KEYS=key-b,key-c
 * const throttler = createProviderThrottler(providerConfigFromEnv("hubspot"));
 * ```
 */
export const providerConfigFromEnv = (
  provider: ProviderName,
  config: Config = getConfig(),
): ProviderConfig => {
  const { providers } = config;
  switch (provider) {
    case "hubspot":
      return parseProviderConfig({
        provider,
        apiKey: providers.hubspot.primaryApiKey,
        backupApiKeys: providers.hubspot.backupApiKeys,
      });
    case "asana":
      return parseProviderConfig({
        provider,
        apiKey: providers.asana.primaryApiKey,
        backupApiKeys: providers.asana.backupApiKeys,
      });
    case "airtable":
      return parseProviderConfig({ provider, apiKey: providers.airtable.apiKey });
    case "slack":
      return parseProviderConfig({ provider, botToken: providers.slack.botToken });
    case "generic":
    case "operation":
      return parseProviderConfig({ provider });
  }
};
