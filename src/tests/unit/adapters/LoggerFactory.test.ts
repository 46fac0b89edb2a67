import pino from 'pino';
import { LoggerFactory } from '@/adapters/logging/LoggerFactory';
import { ConsoleLogger } from '@/adapters/logging/ConsoleLogger';
import { JsonLogger } from '@/adapters/logging/JsonLogger';

describe('LoggerFactory', () => {
  let destination: jest.SpyInstance;

  beforeEach(() => {
    destination = jest.spyOn(pino, 'destination');
  });

  afterEach(() => {
    destination.mockRestore();
  });

  it('should create a JSON logger writing to stderr', () => {
    const logger = new LoggerFactory({ type: 'json', level: 'silent' }).createLogger('test');

    expect(logger).toBeInstanceOf(JsonLogger);
    expect(destination).toHaveBeenCalledWith(2);
  });

  it('should send plain console output to stderr', () => {
    const logger = new LoggerFactory({ type: 'console', level: 'silent', pretty: false }).createLogger();

    expect(logger).toBeInstanceOf(ConsoleLogger);
    expect(destination).toHaveBeenCalledWith(2);
  });

  it('should fall back to the console logger for unknown types', () => {
    const logger = new LoggerFactory({ type: 'syslog', level: 'silent', pretty: false }).createLogger();

    expect(logger).toBeInstanceOf(ConsoleLogger);
  });
});
