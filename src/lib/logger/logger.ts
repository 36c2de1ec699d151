import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** `pretty` prints one readable line per entry; `json` prints JSON lines. */
  format?: LogFormat;
  /** Tag added to every entry, e.g. "state-machine". */
  component?: string;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
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

const createLogEntry = (
  level: LogLevel,
  component: string | undefined,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  ...(component && { component }),
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

const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const tag = entry.component ? ` ${entry.component}:` : "";
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}]${tag} ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Derive a logger that tags every entry with `component`. */
  child: (component: string) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const { level, format = "json", component } = loggerConfig;

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) return;
    const line = formatLog(createLogEntry(entryLevel, component, message, context, error), format);
    switch (entryLevel) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    debug: (message, context): void => write("debug", message, context),
    info: (message, context): void => write("info", message, context),
    warn: (message, context): void => write("warn", message, context),
    error: (message, error, context): void => write("error", message, context, error),
    child: (childComponent: string): Logger =>
      createLogger({
        level,
        format,
        component: component ? `${component}.${childComponent}` : childComponent,
      }),
  };
};

/**
 * Normalize an unknown thrown value before handing it to `logger.error`.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
