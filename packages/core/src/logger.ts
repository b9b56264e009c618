import type { LogLevelName } from './types.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

/**
 * Logger that writes to stderr so stdout only ever carries command output.
 */
export class ConsoleLogger implements ILogger {
  constructor(private readonly level: LogLevel = LogLevel.INFO) {}

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, 'INFO', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, 'WARN', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, 'ERROR', message, args);
  }

  private write(level: LogLevel, label: string, message: string, args: unknown[]): void {
    if (level < this.level) return;
    console.error(`[${label}] ${message}`, ...args);
  }
}
