/**
 * Leveled logger shared by all ndstore packages
 *
 * Output goes through a single replaceable handler so applications can
 * route messages into their own logging setup.
 *
 * @example
 * ```ts
 * import { Logger } from '@ndstore/core';
 *
 * Logger.setLevel('debug');
 * Logger.configure({
 *   handler: (level, message) => myLogger.log(level, message),
 * });
 * ```
 */

/**
 * Log levels in order of verbosity (least to most)
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Custom log handler function signature
 */
export type LogHandler = (level: LogLevel, message: string, ...args: unknown[]) => void;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: 'warn') */
  level?: LogLevel;
  /** Custom handler function (replaces console output) */
  handler?: LogHandler;
}

/**
 * Logger bound to a fixed message prefix
 */
export interface ChildLogger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

function defaultHandler(level: LogLevel, message: string, ...args: unknown[]): void {
  const formattedMessage = `[ndstore] ${message}`;

  switch (level) {
    case 'error':
      console.error(formattedMessage, ...args);
      break;
    case 'warn':
      console.warn(formattedMessage, ...args);
      break;
    case 'info':
    case 'debug':
      console.log(formattedMessage, ...args);
      break;
    case 'silent':
      break;
  }
}

/**
 * Initial level from NDSTORE_QUIET / NDSTORE_DEBUG
 */
function getInitialLevel(): LogLevel {
  if (typeof process !== 'undefined') {
    if (process.env['NDSTORE_QUIET'] === '1') return 'silent';
    if (process.env['NDSTORE_DEBUG'] === '1') return 'debug';
  }
  return 'warn';
}

let currentLevel: LogLevel = getInitialLevel();
let currentHandler: LogHandler = defaultHandler;

function emit(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[currentLevel]) {
    currentHandler(level, message, ...args);
  }
}

export const Logger = {
  configure(config: LoggerConfig): void {
    if (config.level !== undefined) currentLevel = config.level;
    if (config.handler !== undefined) currentHandler = config.handler;
  },

  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Check if messages at a level will be output
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[currentLevel];
  },

  error(message: string, ...args: unknown[]): void {
    emit('error', message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    emit('warn', message, args);
  },

  info(message: string, ...args: unknown[]): void {
    emit('info', message, args);
  },

  debug(message: string, ...args: unknown[]): void {
    emit('debug', message, args);
  },

  /**
   * Reset logger to default configuration
   * Useful for testing
   */
  reset(): void {
    currentLevel = getInitialLevel();
    currentHandler = defaultHandler;
  },

  /**
   * Create a child logger that prefixes every message
   */
  child(prefix: string): ChildLogger {
    return {
      error: (message, ...args) => emit('error', `${prefix} ${message}`, args),
      warn: (message, ...args) => emit('warn', `${prefix} ${message}`, args),
      info: (message, ...args) => emit('info', `${prefix} ${message}`, args),
      debug: (message, ...args) => emit('debug', `${prefix} ${message}`, args),
    };
  },
};
