import type { ExecutionMode } from '../../types/QueryTypes';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

export interface LogContext {
  runId?: string;
  mode?: ExecutionMode;
}

export interface LogMeta {
  [key: string]: unknown;
  queryName?: string;
  executionId?: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: LogContext;
}

export class Logger {
  private serviceName: string;
  private defaultContext?: LogContext;
  private level: LogLevel;

  constructor(serviceName: string, options: LoggerOptions = {}) {
    this.serviceName = serviceName;
    this.defaultContext = options.context;
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    this.level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private formatMessage(
    level: string,
    message: string,
    meta?: LogMeta
  ): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) console.log(this.formatMessage('info', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) console.warn(this.formatMessage('warn', message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  /**
   * Same sink and level, different service tag
   */
  child(serviceName: string): Logger {
    return new Logger(serviceName, { level: this.level, context: this.defaultContext });
  }

  setContext(context: LogContext): void {
    this.defaultContext = context;
  }
}
