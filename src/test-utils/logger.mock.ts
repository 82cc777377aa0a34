import { ILoggerPort } from '../application/ports/logger.port';

export function createMockLogger(): jest.Mocked<ILoggerPort> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
    verbose: jest.fn(),
    log: jest.fn(),
    setLevel: jest.fn(),
    getLevel: jest.fn().mockReturnValue('info'),
  };
}
