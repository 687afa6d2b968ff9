/**
 * Logger that fans every message out to several loggers
 */

import type { ILogger } from '../../domain/interfaces';

export class CompositeLogger implements ILogger {
  private readonly loggers: ILogger[];

  constructor(...loggers: ILogger[]) {
    this.loggers = loggers;
  }

  log(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.log(message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.error(message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.warn(message, ...args));
  }

  info(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.info(message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.debug(message, ...args));
  }
}
