/**
 * Logger Factory
 *
 * Selection Logic:
 * - LOGGER_TYPE=json → JsonLogger (structured lines for log shippers)
 * - LOGGER_TYPE=console or unset → ConsoleLogger (default)
 *
 * Level comes from LOG_LEVEL unless the caller overrides it
 * (the CLI does when the config file turns on debug-mode).
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';
import { JsonLogger } from './JsonLogger';

export interface LoggerFactoryOptions {
  type?: string;
  level?: string;
  pretty?: boolean;
}

export class LoggerFactory implements ILoggerFactory {
  private readonly type: string;
  private readonly level: string;
  private readonly pretty: boolean;

  constructor(options: LoggerFactoryOptions = {}) {
    this.type = (options.type || process.env.LOGGER_TYPE || 'console').toLowerCase();
    this.level = options.level || process.env.LOG_LEVEL || 'info';
    this.pretty =
      options.pretty ??
      (process.env.NODE_ENV === 'development' && process.env.LOG_PRETTY !== 'false');
  }

  createLogger(context?: string): ILogger {
    switch (this.type) {
      case 'json':
        return new JsonLogger(context, { level: this.level });

      case 'console':
      default:
        return new ConsoleLogger(context, { level: this.level, pretty: this.pretty });
    }
  }
}

/**
 * Default logger for infrastructure modules (database pool, metrics flush)
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('toolbox');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
