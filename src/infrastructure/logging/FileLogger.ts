/**
 * File logger implementation
 * Appends to app-YYYY-MM-DD.log; errors are also copied to error-YYYY-MM-DD.log
 */

import fs from 'fs';
import path from 'path';
import type { ILogger } from '../../domain/interfaces';
import config from '../../config';
import { type LogLevel, isEnabled } from './LogLevel';

export class FileLogger implements ILogger {
  private readonly logFile: string;
  private readonly errorFile: string;
  private writeStream: fs.WriteStream | null = null;
  private errorStream: fs.WriteStream | null = null;

  constructor(
    logDir: string = config.LOG_DIR,
    private readonly minLevel: LogLevel = config.LOG_LEVEL
  ) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory ${logDir}`, { cause: error });
    }

    const day = new Date().toISOString().split('T')[0];
    this.logFile = path.join(logDir, `app-${day}.log`);
    this.errorFile = path.join(logDir, `error-${day}.log`);

    this.writeStream = this.openStream(this.logFile);
    this.errorStream = this.openStream(this.errorFile);
  }

  get files(): { log: string; error: string } {
    return { log: this.logFile, error: this.errorFile };
  }

  log(message: string, ...args: unknown[]): void {
    this.write('info', 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', 'ERROR', message, args);
    this.writeLine(this.errorStream, this.formatMessage('ERROR', message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', 'WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', 'INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', 'DEBUG', message, args);
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): Promise<void> {
    const streams = [this.writeStream, this.errorStream];
    this.writeStream = null;
    this.errorStream = null;

    return Promise.all(
      streams.map(
        (stream) =>
          new Promise<void>((resolve) => {
            if (!stream || stream.destroyed) {
              resolve();
              return;
            }
            stream.end(() => resolve());
          })
      )
    ).then(() => undefined);
  }

  private openStream(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', (err) => {
      console.error(`Error writing to ${file}:`, err);
    });
    return stream;
  }

  private write(level: LogLevel, label: string, message: string, args: unknown[]): void {
    if (!isEnabled(level, this.minLevel)) {
      return;
    }
    this.writeLine(this.writeStream, this.formatMessage(label, message, args));
  }

  private formatMessage(label: string, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    return `[${timestamp}] [${label}] ${message}${argsStr}\n`;
  }

  private writeLine(stream: fs.WriteStream | null, line: string): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(line);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}
