import { isOutlineError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: '[docoutline]',
  minLevel: 'info',
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Console logger with a level gate and key=value context.
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const parts = [this.config.prefix, `[${level.toUpperCase()}]`, message];

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(' ');
      parts.push(`| ${contextStr}`);
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.format(level, message, context);
    switch (level) {
      case 'error':
        console.error(formatted);
        if (isOutlineError(error)) console.error(JSON.stringify(error.toJSON()));
        else if (error) console.error(error);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log('error', message, context, error);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

export const logger = new Logger();

export function setLogLevel(level: LogLevel): void {
  logger.configure({ minLevel: level });
}

const envLevel = process.env.DOCOUTLINE_LOG_LEVEL;
if (envLevel && isLogLevel(envLevel)) {
  setLogLevel(envLevel);
}
