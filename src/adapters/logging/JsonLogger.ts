/**
 * JSON Logger Adapter
 *
 * Structured JSON lines on stderr for log shippers (CloudWatch agent,
 * fluentd, journald). Every line carries the service name and host
 * environment so runs from different machines can be told apart.
 */

import pino from 'pino';
import { PinoAdapterOptions, PinoLoggerAdapter } from './PinoLoggerAdapter';

export class JsonLogger extends PinoLoggerAdapter {
  constructor(context: string | undefined, options: PinoAdapterOptions) {
    super(
      pino(
        {
          name: context || 'toolbox',
          level: options.level,
          formatters: {
            level: (label) => {
              return { level: label.toUpperCase() };
            },
          },
          base: {
            env: process.env.NODE_ENV || 'production',
            service: 'history-toolbox',
          },
          timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.destination(2)
      )
    );
  }
}
