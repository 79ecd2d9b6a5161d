/**
 * Composite logger that writes to both console and file
 */

import type { ILogger } from '../../domain/interfaces';
import config from '../../config';
import { ConsoleLogger } from './ConsoleLogger';
import { FileLogger } from './FileLogger';
import type { LogLevel } from './LogLevel';

export class CompositeLogger implements ILogger {
  private readonly consoleLogger: ConsoleLogger;
  private readonly fileLogger: FileLogger;

  constructor(logDir: string = config.LOG_DIR, minLevel: LogLevel = config.LOG_LEVEL) {
    this.consoleLogger = new ConsoleLogger(minLevel);
    this.fileLogger = new FileLogger(logDir, minLevel);
  }

  log(message: string, ...args: unknown[]): void {
    this.consoleLogger.log(message, ...args);
    this.fileLogger.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.consoleLogger.error(message, ...args);
    this.fileLogger.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.consoleLogger.warn(message, ...args);
    this.fileLogger.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.consoleLogger.info(message, ...args);
    this.fileLogger.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.consoleLogger.debug(message, ...args);
    this.fileLogger.debug(message, ...args);
  }

  /**
   * Flush and close the log files (call on application shutdown)
   */
  close(): Promise<void> {
    return this.fileLogger.close();
  }
}
