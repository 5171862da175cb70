/**
 * Structured logging utility for Time Atlas
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * JSON lines in production, single pretty lines elsewhere.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Metadata merged into every entry written by this logger */
  readonly context: LogMetadata;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...(metadata ?? {}) };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...merged,
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

  /**
   * Derive a logger that stamps extra metadata on every entry
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  service: 'time-atlas',
  pretty: process.env.NODE_ENV !== 'production',
  context: {},
});

/**
 * Create a module logger with additional context
 *
 * The `module` key becomes part of the service name; every other key is
 * attached to each entry.
 */
export function createLogger(context: LogMetadata, level?: LogLevel): Logger {
  const { module, ...rest } = context;
  return new Logger({
    level: level ?? parseLogLevel(process.env.LOG_LEVEL),
    service: `time-atlas:${typeof module === 'string' ? module : 'unknown'}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
