export { createLogger, getLogger, type Logger, type LoggerConfig } from "./logger";

export type { LogLevel } from "./schema";
