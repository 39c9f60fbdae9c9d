/**
 * Logger Factory
 *
 * Hands out named loggers. Application code depends on ILogger only, so a
 * different backend can be plugged in here without touching services.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new ConsoleLogger(context);
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
