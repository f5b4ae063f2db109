import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

/**
 * Comma separated list of keys, blanks dropped.
 */
const keyListSchema = v.pipe(
  v.string(),
  v.transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  ),
);

const apiKeySchema = v.pipe(v.string(), v.minLength(1));

export const envSchema = v.object({
  // Runtime
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // HubSpot (private app tokens, rotated on 429)
  HUBSPOT_API_KEY: v.optional(apiKeySchema),
  HUBSPOT_BACKUP_API_KEYS: v.optional(keyListSchema, ""),

  // Asana (personal access tokens, rotated on 429)
  ASANA_API_KEY: v.optional(apiKeySchema),
  ASANA_BACKUP_API_KEYS: v.optional(keyListSchema, ""),

  // Airtable
  AIRTABLE_API_KEY: v.optional(apiKeySchema),

  // Slack
  SLACK_BOT_TOKEN: v.optional(apiKeySchema),
});

export type Env = v.InferOutput<typeof envSchema>;
