/**
 * Console logger implementation
 */

import type { ILogger } from '../../domain/interfaces';
import config from '../../config';
import { type LogLevel, isEnabled } from './LogLevel';

export class ConsoleLogger implements ILogger {
  constructor(private readonly minLevel: LogLevel = config.LOG_LEVEL) {}

  log(message: string, ...args: unknown[]): void {
    if (isEnabled('info', this.minLevel)) {
      console.log(message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (isEnabled('warn', this.minLevel)) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isEnabled('info', this.minLevel)) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isEnabled('debug', this.minLevel)) {
      console.debug(message, ...args);
    }
  }
}
