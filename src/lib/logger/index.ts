export { createLogger, type Logger, type LoggerConfig } from "./logger";

export type { LogLevel } from "./schema";
