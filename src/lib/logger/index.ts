export { createLogger, toError, type Logger, type LoggerConfig } from "./logger";

export type { LogFormat, LogLevel } from "./schema";
export { logFormatSchema, logLevelSchema } from "./schema";
