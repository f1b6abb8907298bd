import { ENV } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

const currentLevel: LogLevel = isLogLevel(ENV.LOG_LEVEL) ? ENV.LOG_LEVEL : "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Leveled console logger. Every line carries the scope in brackets,
 * e.g. `[14:02:11] [INFO]  [matches-crawl] Found 12 match references`.
 */
export function createLogger(scope: string): Logger {
  return {
    debug(msg, ...args) {
      if (shouldLog("debug")) console.log(`[${timestamp()}] [DEBUG] [${scope}] ${msg}`, ...args);
    },
    info(msg, ...args) {
      if (shouldLog("info")) console.log(`[${timestamp()}] [INFO]  [${scope}] ${msg}`, ...args);
    },
    warn(msg, ...args) {
      if (shouldLog("warn")) console.warn(`[${timestamp()}] [WARN]  [${scope}] ${msg}`, ...args);
    },
    error(msg, ...args) {
      if (shouldLog("error")) console.error(`[${timestamp()}] [ERROR] [${scope}] ${msg}`, ...args);
    },
  };
}
