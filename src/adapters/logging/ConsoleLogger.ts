/**
 * Console Logger Adapter
 *
 * Human-oriented output for interactive runs. Pretty-printed through
 * pino-pretty when enabled, plain pino JSON otherwise. Both go to stderr;
 * stdout carries the outcome table.
 */

import pino from 'pino';
import { PinoAdapterOptions, PinoLoggerAdapter } from './PinoLoggerAdapter';

export class ConsoleLogger extends PinoLoggerAdapter {
  constructor(context: string | undefined, options: PinoAdapterOptions) {
    const base = { name: context || 'toolbox', level: options.level };

    super(
      options.pretty
        ? pino({
            ...base,
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2,
              },
            },
          })
        : pino(base, pino.destination(2))
    );
  }
}
