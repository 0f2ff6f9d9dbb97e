import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  data?: LogContext;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const isLogLevel = (value: string): value is LogLevel =>
  LEVEL_ORDER.some((level) => level === value);

/**
 * Structured JSON logger installed through `app.useLogger`.
 *
 * Nest's `Logger` passes its context as the trailing string argument, and
 * `error()` may carry a stack trace before it; both are folded into the entry.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly level: LogLevel;
  private readonly isProduction: boolean;
  private context?: string;

  constructor(private readonly config: ConfigService) {
    const configured = (this.config.get<string>('LOG_LEVEL') || 'info').toLowerCase();
    this.level = isLogLevel(configured) ? configured : LogLevel.INFO;
    this.isProduction = this.config.get<string>('NODE_ENV') === 'production';
  }

  setContext(context: string): this {
    this.context = context;
    return this;
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.DEBUG, message, optionalParams);
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.INFO, message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.WARN, message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.ERROR, message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.writeLog(LogLevel.ERROR, message, optionalParams);
  }

  private writeLog(level: LogLevel, message: unknown, params: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const { context, data } = this.splitParams(params);
    const entry: LogEntry = {
      level,
      message: typeof message === 'string' ? message : JSON.stringify(message),
      timestamp: new Date().toISOString(),
      ...((context || this.context) && { context: context || this.context }),
      ...(data && { data }),
    };

    if (this.isProduction) {
      process.stdout.write(`${JSON.stringify(entry)}\n`);
    } else {
      this.prettyPrint(entry);
    }
  }

  private splitParams(params: unknown[]): { context?: string; data?: LogContext } {
    const rest = [...params];
    let context: string | undefined;
    if (rest.length && typeof rest[rest.length - 1] === 'string') {
      context = String(rest.pop());
    }

    const data: LogContext = {};
    for (const param of rest) {
      if (param instanceof Error) {
        Object.assign(data, { name: param.name, error: param.message, stack: param.stack });
      } else if (typeof param === 'string') {
        data.stack = param;
      } else if (typeof param === 'object' && param !== null) {
        Object.assign(data, param);
      }
    }

    return { context, data: Object.keys(data).length ? data : undefined };
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private prettyPrint(entry: LogEntry): void {
    const { level, message, timestamp, context, data } = entry;
    const prefix = [this.colorizeLevel(level), timestamp, context && `[${context}]`]
      .filter(Boolean)
      .join(' ');

    // eslint-disable-next-line no-console
    console.log(prefix, message);

    if (data) {
      // eslint-disable-next-line no-console
      console.log('  ', JSON.stringify(data, null, 2));
    }
  }

  private colorizeLevel(level: LogLevel): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
    };
    return `${colors[level]}${level.toUpperCase()}\x1b[0m`;
  }
}
