/**
 * Logger Factory
 *
 * Hands out ILogger instances bound to a context name. Every logger is a
 * child of the root pino logger, so level and transport are configured once.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { logger as rootLogger } from '@/utils/logger';
import { ConsoleLogger } from './ConsoleLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new ConsoleLogger(context ? rootLogger.child({ context }) : rootLogger);
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
