/**
 * Structured logging for the environment data pipeline
 *
 * Every entry carries the service (`okavango:<module>`) plus any context
 * bound with `child()`, so per-dataset work reads as
 * `logger.child({ dataset }).info(...)` and each line names its dataset.
 * JSON lines in production, single-line pretty output otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Fields merged into every entry; per-call metadata wins on conflict */
  readonly context?: LogMetadata;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  /**
   * Logger with `context` added to every entry
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.config.level];
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const fields: LogMetadata = { ...this.config.context, ...metadata };

    if (this.config.pretty) {
      const metaStr = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...fields,
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

const SERVICE_NAME = 'okavango';

export const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

export const logger = new Logger({
  level: getLogLevel(),
  service: SERVICE_NAME,
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Logger scoped to a pipeline module
 */
export function createLogger(module: string): Logger {
  return new Logger({
    level: getLogLevel(),
    service: `${SERVICE_NAME}:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
