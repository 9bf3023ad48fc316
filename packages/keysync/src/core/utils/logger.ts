/**
 * Structured logging utility for KeySync
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines in production, a single readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggingSettings {
  level: LogLevel;
  pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
};

// Shared by every logger so the CLI can change verbosity after modules load
const settings: LoggingSettings = {
  level: getLogLevel(),
  pretty: process.env.NODE_ENV !== 'production',
};

/**
 * Change level and/or output format for all loggers
 */
export function configureLogging(update: Partial<LoggingSettings>): void {
  if (update.level !== undefined) settings.level = update.level;
  if (update.pretty !== undefined) settings.pretty = update.pretty;
}

export class Logger {
  constructor(private readonly service: string) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[settings.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (settings.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

export const logger = new Logger('keysync');

/**
 * Create a child logger scoped to a module
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`keysync:${context.module}`);
}
