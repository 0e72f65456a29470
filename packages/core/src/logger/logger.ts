export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.level !== "silent" && LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Level resolution: explicit argument, then `UNIONMOUNT_LOG_LEVEL`, then
 * `silent` under test runners, then `info`.
 */
export function createLogger(prefix: string = "", level?: LogLevel): ConsoleLogger {
  const fromEnv = process.env["UNIONMOUNT_LOG_LEVEL"];
  const logLevel = level ??
    (isLogLevel(fromEnv) ? fromEnv : undefined) ??
    (process.env["NODE_ENV"] === "test" ? "silent" : "info");

  return new ConsoleLogger(prefix, logLevel);
}

/** Shared engine logger; every mount module logs through it unless given its own. */
export const logger = createLogger("[unionmount] ");
