/**
 * File logger implementation
 * Appends log lines to dated files in the runtime directory; errors also go to
 * a separate error file
 */

import fs from 'fs';
import path from 'path';
import type { ILogger } from '../../domain/interfaces';
import { describeError } from '../../domain/errors';

type FileLevel = 'LOG' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export class FileLogger implements ILogger {
  readonly logFile: string;
  readonly errorFile: string;
  private writeStream: fs.WriteStream | null;
  private errorStream: fs.WriteStream | null;

  constructor(logDir: string) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory: ${describeError(error)}`);
    }

    const date = new Date().toISOString().split('T')[0];
    this.logFile = path.join(logDir, `streamer-${date}.log`);
    this.errorFile = path.join(logDir, `streamer-error-${date}.log`);

    this.writeStream = this.openStream(this.logFile);
    this.errorStream = this.openStream(this.errorFile);
  }

  log(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(this.errorStream, 'ERROR', message, args);
    this.write(this.writeStream, 'ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'DEBUG', message, args);
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): void {
    this.writeStream?.end();
    this.errorStream?.end();
    this.writeStream = null;
    this.errorStream = null;
  }

  private openStream(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', (err) => {
      console.error(`Error writing to ${file}:`, err);
    });
    return stream;
  }

  private write(stream: fs.WriteStream | null, level: FileLevel, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(FileLogger.format(level, message, args));
  }

  static format(level: FileLevel, message: string, args: unknown[], at: Date = new Date()): string {
    const rendered = args.map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? arg.message;
      }
      return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
    });
    return `[${at.toISOString()}] [${level}] ${[message, ...rendered].join(' ')}\n`;
  }
}
