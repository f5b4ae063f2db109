/**
 * request-throttler
 *
 * Client-side admission control for rate-limited APIs: proactive throttling,
 * exponential backoff with jitter and credential rotation.
 */

export * from "./lib/rate-limiter";
export * from "./lib/http";
export * from "./providers";

export { createLogger, type Logger, type LoggerConfig, type LogLevel } from "./lib/logger";
export { buildConfig, getConfig, type Config } from "./lib/config";
export { EnvValidationError, getEnv, parseEnv, resetEnvCache, type Env } from "./lib/env";
