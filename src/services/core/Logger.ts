import { TraceContext } from '../../types/CommonTypes';

export interface LogMeta {
  [key: string]: unknown;
  traceId?: string;
  region?: string;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  context?: TraceContext;
  /** Lowest level written. Defaults to info. */
  level?: LogLevel;
}

/**
 * Line-oriented structured logger: `[timestamp] [LEVEL] [service] message {meta}`.
 * The level comes from configuration (`LOG_LEVEL`) and is fixed per logger until `setLevel`.
 */
export class Logger {
  private readonly serviceName: string;
  private defaultContext?: TraceContext;
  private threshold: number;

  constructor(serviceName: string, options: LoggerOptions = {}) {
    this.serviceName = serviceName;
    this.defaultContext = options.context;
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    const enrichedMeta = { ...this.defaultContext, ...meta };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  get level(): LogLevel {
    return LOG_LEVELS[this.threshold];
  }

  setLevel(level: LogLevel): void {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  setContext(context: TraceContext): void {
    this.defaultContext = context;
  }

  /**
   * Logger for a collaborator, sharing this logger's context and level.
   */
  child(serviceName: string): Logger {
    return new Logger(serviceName, { context: this.defaultContext, level: this.level });
  }
}
