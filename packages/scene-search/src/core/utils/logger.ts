/**
 * Structured logging utility for scene search
 *
 * Levels, ISO timestamps and contextual metadata on top of the console.
 * JSON lines in production, one readable line otherwise.
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
  readonly context?: LogMetadata;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Output settings shared between a logger and its children */
interface OutputState {
  level: LogLevel;
  pretty: boolean;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly state: OutputState;

  constructor(config: LoggerConfig, state?: OutputState) {
    this.config = config;
    this.state = state ?? { level: config.level, pretty: config.pretty };
  }

  get level(): LogLevel {
    return this.state.level;
  }

  /**
   * Change the level for this logger and every child created from it
   */
  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  /**
   * Switch between JSON lines and readable output
   */
  setPretty(pretty: boolean): void {
    this.state.pretty = pretty;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.state.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.state.pretty) {
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
   * Child logger sharing this logger's level, with extra context on every line
   */
  child(context: LogMetadata): Logger {
    return new Logger(
      {
        ...this.config,
        context: { ...this.config.context, ...context },
      },
      this.state
    );
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

const getLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

// Default logger instance
export const logger = new Logger({
  level: getLogLevel(),
  service: 'scene-search',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a module logger. It follows the default logger's level, so
 * `logger.setLevel()` from the CLI reaches every module.
 */
export function createLogger(context: LogMetadata): Logger {
  return logger.child(context);
}
