import { sanitizeForLog } from './validation.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

let defaultLevel: LogLevel = isLogLevel(process.env['LOG_LEVEL']) ? process.env['LOG_LEVEL'] : 'info';

/** Changes the level used by loggers created without an explicit one. */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export class Logger {
  private context: string;
  private minLevel: LogLevel | undefined;

  constructor(context: string, minLevel?: LogLevel) {
    this.context = context;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel ?? defaultLevel];
  }

  private formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const color = LOG_COLORS[level];
    const prefix = `${color}[${timestamp}] [${level.toUpperCase()}] [${this.context}]${RESET}`;
    const dataStr = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(sanitizeForLog(data))}` : '';
    return `${prefix} ${message}${dataStr}`;
  }

  private toErrorData(errorOrData: unknown, data?: Record<string, unknown>): Record<string, unknown> {
    if (errorOrData instanceof Error) {
      return { ...data, error: errorOrData.message, stack: errorOrData.stack };
    }
    if (typeof errorOrData === 'object' && errorOrData !== null) {
      return { ...data, ...Object.fromEntries(Object.entries(errorOrData)) };
    }
    if (errorOrData !== undefined) {
      return { ...data, error: String(errorOrData) };
    }
    return data ?? {};
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, this.toErrorData(errorOrData, data)));
    }
  }

  fatal(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog('fatal')) {
      console.error(this.formatMessage('fatal', message, this.toErrorData(errorOrData, data)));
    }
  }

  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, this.minLevel);
  }
}

export function createLogger(context: string, minLevel?: LogLevel): Logger {
  return new Logger(context, minLevel);
}
