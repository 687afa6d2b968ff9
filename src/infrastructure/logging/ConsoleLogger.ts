/**
 * Console logger implementation
 * Messages below the configured level are dropped
 */

import type { ILogger, LogLevel } from '../../domain/interfaces';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class ConsoleLogger implements ILogger {
  constructor(private readonly minLevel: LogLevel = 'debug') {}

  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(message, ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}
