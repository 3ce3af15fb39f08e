import { loadConfig } from "../config";

import type { LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable lines instead of JSON. */
  pretty?: boolean;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
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

const readErrorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const code = error ? readErrorCode(error) : undefined;
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(code && { code }),
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
  return entry;
};

// Amounts are bigint throughout the engine; JSON has no bigint.
const replaceBigint = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

const formatLog = (entry: LogEntry, pretty: boolean): string => {
  if (pretty) {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context, replaceBigint)}` : ""
    }`;
  }
  return JSON.stringify(entry, replaceBigint);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

const defaultLoggerConfig = (): LoggerConfig => {
  const config = loadConfig();
  return {
    level: config.logging.level,
    pretty: config.server.nodeEnv === "development",
  };
};

export const createLogger = (loggerConfig: LoggerConfig = defaultLoggerConfig()): Logger => {
  const pretty = loggerConfig.pretty ?? false;

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("debug", message, context), pretty));
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("info", message, context), pretty));
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", loggerConfig.level)) {
        console.warn(formatLog(createLogEntry("warn", message, context), pretty));
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (shouldLog("error", loggerConfig.level)) {
        console.error(formatLog(createLogEntry("error", message, context, error), pretty));
      }
    },
  };
};

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger, created from config on first use.
 */
export const getLogger = (): Logger => {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
};
