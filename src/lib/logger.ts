/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('ExportOrchestrator');
 *   log.debug('Details here', { data });
 *   log.info('Operation complete');
 *   log.warn('Something unexpected');
 *   log.error('Failed', error);
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  prefix: string;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Resolve the starting level from the environment.
 * LOG_LEVEL wins; otherwise everything is shown outside production.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const named = env.LOG_LEVEL?.toLowerCase();
  if (named && named in LEVEL_NAMES) {
    return LEVEL_NAMES[named] ?? LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;
}

// Child loggers share this so setLevel() on the root reaches all of them
const sharedLevel = { current: resolveLogLevel(process.env) };

class Logger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      prefix: '',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= sharedLevel.current;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
    });
  }

  /**
   * Set the log level at runtime (applies to every logger)
   */
  setLevel(level: LogLevel): void {
    sharedLevel.current = level;
  }

  getLevel(): LogLevel {
    return sharedLevel.current;
  }
}

export type { Logger };

// Root logger instance
export const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('FfmpegEncoder');
 * log.debug('Spawned encoder', { pid });
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
