import * as v from "valibot";
import { type Env, envSchema } from "./schema";

/**
 * Environment failed validation. `issues` holds one "path: message" per problem.
 */
export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Environment variable validation failed: ${issues.join("; ")}`);
    this.name = "EnvValidationError";
  }
}

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }

  const issues = result.issues.map(
    (issue) => `${issue.path?.map((item) => String(item.key)).join(".") ?? "env"}: ${issue.message}`,
  );
  console.error("Environment variable validation failed:");
  for (const issue of issues) {
    console.error(`  - ${issue}`);
  }
  throw new EnvValidationError(issues);
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

/**
 * Drops the cached environment so the next read parses process.env again.
 */
export const resetEnvCache = (): void => {
  cachedEnv = undefined;
};

// Re-export types
export type { Env } from "./schema";
