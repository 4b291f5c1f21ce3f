import type { LogLevel } from '../types';

export interface LoggerContext {
  service?: string;
  environment?: string;
  profile?: string;
  dialect?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const REDACTED_KEYS = /token|secret|password|authorization/i;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private readonly ctx: LoggerContext;
  private readonly minLevel: LogLevel;

  constructor(ctx: LoggerContext = {}, options?: { level?: LogLevel }) {
    this.ctx = ctx;
    this.minLevel = options?.level ?? 'info';
  }

  /**
   * Logger sharing this one's level, with extra bound context
   */
  child(ctx: LoggerContext): Logger {
    return new Logger({ ...this.ctx, ...ctx }, { level: this.minLevel });
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.emit('error', message, data);
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }
    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.ctx,
      ...this.redact(data || {}),
    };
    const line = JSON.stringify(entry);
    if (level === 'error') {
      // eslint-disable-next-line no-console
      console.error(line);
    } else if (level === 'warn') {
      // eslint-disable-next-line no-console
      console.warn(line);
    } else if (level === 'debug') {
      // eslint-disable-next-line no-console
      console.debug(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      if (REDACTED_KEYS.test(k)) {
        redacted[k] = '[REDACTED]';
      } else {
        redacted[k] = v;
      }
    }
    return redacted;
  }
}
