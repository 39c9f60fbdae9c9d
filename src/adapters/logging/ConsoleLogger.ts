/**
 * Console Logger Adapter
 *
 * Structured pino logging to stdout. Every adapter is a child of the root
 * pino instance, so all components share one transport and level.
 */

import pino from 'pino';
import { logger as rootLogger } from '@/utils/logger';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class ConsoleLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(context?: string) {
    this.logger = rootLogger.child({ context: context ?? 'app' });
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  private write(level: LogLevel, messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
