import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

/**
 * Shared ILogger implementation over a pino instance.
 * Concrete adapters only decide how the pino instance is configured.
 */
export abstract class PinoLoggerAdapter implements ILogger {
  protected constructor(protected readonly logger: pino.Logger) {}

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.debug(messageOrMetadata);
    } else {
      this.logger.debug(messageOrMetadata, message);
    }
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.info(messageOrMetadata);
    } else {
      this.logger.info(messageOrMetadata, message);
    }
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.warn(messageOrMetadata);
    } else {
      this.logger.warn(messageOrMetadata, message);
    }
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.error(messageOrMetadata);
    } else {
      this.logger.error(messageOrMetadata, message);
    }
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.fatal(messageOrMetadata);
    } else {
      this.logger.fatal(messageOrMetadata, message);
    }
  }
}

/**
 * Options every adapter accepts
 */
export interface PinoAdapterOptions {
  level: string;
  /** Pretty-print with pino-pretty (console adapter only) */
  pretty?: boolean;
}
