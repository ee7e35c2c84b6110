import { config } from "../config";

import type { LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Fields merged into the context of every entry. */
  bindings?: Record<string, unknown>;
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

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

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
): LogEntry => ({
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
});

const formatLog = (entry: LogEntry): string => {
  if (config.server.nodeEnv === "development") {
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
  loggerConfig: LoggerConfig = { level: config.logging.level },
): Logger => {
  const { level: currentLevel, bindings } = loggerConfig;

  const write = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    if (!shouldLog(level, currentLevel)) {
      return;
    }
    const line = formatLog(createLogEntry(level, message, mergeContext(bindings, context), error));
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
  };
};

export const logger = createLogger();
