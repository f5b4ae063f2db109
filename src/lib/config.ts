import { type Env, getEnv } from "./env/env";
import type { LogLevel } from "./logger/schema";

export interface Config {
  runtime: {
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
  };
  providers: {
    hubspot: { primaryApiKey: string | undefined; backupApiKeys: string[] };
    asana: { primaryApiKey: string | undefined; backupApiKeys: string[] };
    airtable: { apiKey: string | undefined };
    slack: { botToken: string | undefined };
  };
}

export const buildConfig = (env: Env): Config => ({
  runtime: {
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
  },
  providers: {
    hubspot: {
      primaryApiKey: env.HUBSPOT_API_KEY,
      backupApiKeys: env.HUBSPOT_BACKUP_API_KEYS,
    },
    asana: {
      primaryApiKey: env.ASANA_API_KEY,
      backupApiKeys: env.ASANA_BACKUP_API_KEYS,
    },
    airtable: { apiKey: env.AIRTABLE_API_KEY },
    slack: { botToken: env.SLACK_BOT_TOKEN },
  },
});

export const getConfig = (): Config => buildConfig(getEnv());
