/**
 * Floor Plan Search - Logging Utility
 *
 * Configurable logging with levels that can be disabled in production.
 * Modules get a scoped logger so every line says where it came from.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

/** Environment variable read by `setLevelFromEnv` */
export const LOG_LEVEL_ENV = 'LAYOUT_LOG_LEVEL';

let currentLevel: LogLevel = LogLevel.WARN;

/**
 * Logger with configurable levels.
 * Default level is WARN - only warnings and errors are shown.
 * Set to DEBUG to trace placement failures and per-iteration progress.
 */
export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /**
   * Debug-level logging for algorithm tracing
   * Use for: dropped rooms, failed recombinations, per-iteration scores
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) {
      console.log(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Info-level logging for major algorithm steps
   * Use for: search start/end, worker completion
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) {
      console.log(`[INFO] ${msg}`, ...args);
    }
  },

  /**
   * Warning-level logging for unexpected but non-fatal conditions
   * Use for: unnormalized weights, layouts returned with validation errors
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) {
      console.warn(`[WARN] ${msg}`, ...args);
    }
  },

  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) {
      console.error(`[ERROR] ${msg}`, ...args);
    }
  }
};

export interface ScopedLogger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Returns a logger that prefixes each message with `[scope]`.
 * Scoped loggers share the global level.
 */
export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (msg, ...args) => Logger.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => Logger.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => Logger.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => Logger.error(`${prefix} ${msg}`, ...args)
  };
}

/**
 * Parses a level name (case-insensitive). Unknown names yield undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'none':
    case 'silent':
      return LogLevel.NONE;
    default:
      return undefined;
  }
}

/**
 * Applies `LAYOUT_LOG_LEVEL` from the given environment, if set and valid
 */
export function setLevelFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const level = parseLogLevel(env[LOG_LEVEL_ENV]);
  if (level !== undefined) {
    Logger.setLevel(level);
  }
}

/**
 * Convenience function to enable debug logging during development
 */
export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

/**
 * Convenience function to disable all logging (production mode)
 */
export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
