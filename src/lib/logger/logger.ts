import { type Config, getConfig } from "../config";

import type { LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Fixed context merged into every entry (e.g. provider name) */
  bindings?: Record<string, unknown>;
  /** Output format switch, read from config once when omitted */
  nodeEnv?: Config["runtime"]["nodeEnv"];
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean => {
  const levelValue = logLevels[level];
  const currentLevelValue = logLevels[currentLevel];
  return levelValue >= currentLevelValue;
};

const mergeContext = (
  bindings: Record<string, unknown> | undefined,
  context: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined => {
  if (!bindings) {
    return context;
  }
  return { ...bindings, ...context };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
  return entry;
};

const formatLog = (entry: LogEntry, readable: boolean): string => {
  if (readable) {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

export const createLogger = (
  loggerConfig: LoggerConfig = { level: getConfig().logging.level },
): Logger => {
  const { level: currentLevel, bindings, nodeEnv = getConfig().runtime.nodeEnv } = loggerConfig;
  const readable = nodeEnv === "development";

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", currentLevel)) {
        console.log(
          formatLog(createLogEntry("debug", message, mergeContext(bindings, context)), readable),
        );
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", currentLevel)) {
        console.log(
          formatLog(createLogEntry("info", message, mergeContext(bindings, context)), readable),
        );
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", currentLevel)) {
        console.warn(
          formatLog(createLogEntry("warn", message, mergeContext(bindings, context)), readable),
        );
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (shouldLog("error", currentLevel)) {
        console.error(
          formatLog(
            createLogEntry("error", message, mergeContext(bindings, context), error),
            readable,
          ),
        );
      }
    },
  };
};
