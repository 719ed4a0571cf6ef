/**
 * Structured logging utility for soil-stats
 *
 * Console-based structured logger with levels, timestamps and contextual
 * metadata. JSON lines in production, single readable lines otherwise.
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
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/** Level set at run time (CLI --log-level, config file); wins over env */
let levelOverride: LogLevel | null = null;

const getLogLevel = (): LogLevel => {
  if (levelOverride) return levelOverride;
  const level = (process.env.SOIL_STATS_LOG_LEVEL ?? process.env.LOG_LEVEL)?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
};

const isPretty = (): boolean => process.env.NODE_ENV !== 'production';

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get service(): string {
    return this.config.service;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[levelOverride ?? this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
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

/**
 * Force a level for every logger, or clear the override with null
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export const logger = new Logger({
  level: getLogLevel(),
  service: 'soil-stats',
  pretty: isPretty(),
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: LogMetadata): Logger {
  const module = typeof context.module === 'string' ? context.module : 'unknown';
  return new Logger({
    level: getLogLevel(),
    service: `soil-stats:${module}`,
    pretty: isPretty(),
  });
}
