export { ConsoleLogger, createLogger, isLogLevel, logger, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel } from "./logger";
