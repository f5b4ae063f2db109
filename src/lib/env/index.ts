export { EnvValidationError, getEnv, parseEnv, resetEnvCache, type Env } from "./env";
