/**
 * Supported log levels for the Logger, in increasing severity.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Process-wide minimum level.
 * Set once at startup from configuration.
 */
let minLevel: LogLevel = 'info';

/**
 * Sets the process-wide minimum log level.
 * 'warn' and 'error' are emitted regardless of this setting.
 *
 * @param level - The lowest level that should be printed.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/**
 * Gets the current process-wide minimum log level.
 *
 * @returns The active minimum level.
 */
export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Structured logger for the server and its libraries.
 *
 * Provides a consistent way to log messages across different parts of the process
 * with support for scope-based tagging and level filtering.
 *
 * Behavior:
 * - 'debug' and 'info' are printed only when at or above the configured level.
 * - 'warn' and 'error' are always shown.
 */
export class Logger {
  /**
   * The scope/category of this logger instance.
   * Prepended to every log message.
   */
  private scope: string;

  /**
   * Creates a new Logger instance.
   *
   * @param scope - The context name (e.g. 'FeedSubscriber', 'HTTP').
   */
  constructor(scope: string) {
    this.scope = scope;
  }

  /**
   * Determines if a message at the given level should be logged.
   *
   * @param level - The log level to check.
   * @returns True if the message should be logged, false otherwise.
   */
  private shouldLog(level: LogLevel): boolean {
    if (level === 'warn' || level === 'error') return true;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
  }

  /**
   * Formats the log message with a timestamp and the current scope.
   *
   * @param message - The raw log message.
   * @returns The formatted string: "2024-01-01T00:00:00.000Z [Scope] Message".
   */
  private formatMessage(message: string): string {
    return `${new Date().toISOString()} [${this.scope}] ${message}`;
  }

  /**
   * Logs a debug message.
   *
   * @param message - The message to log.
   * @param args - Additional data to log.
   */
  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  /**
   * Logs an info message.
   *
   * @param message - The message to log.
   * @param args - Additional data to log.
   */
  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  /**
   * Logs a warning message.
   * Always shown.
   *
   * @param message - The message to log.
   * @param args - Additional data to log.
   */
  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  /**
   * Logs an error message.
   * Always shown.
   *
   * @param message - The message to log.
   * @param args - Additional data to log.
   */
  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage(message), ...args);
    }
  }
}

/**
 * Factory function to create a new logger instance for a specific scope.
 *
 * @param scope - The context name (e.g. 'FeedSubscriber', 'HTTP').
 * @returns A new Logger instance.
 */
export function createLogger(scope: string) {
  return new Logger(scope);
}
