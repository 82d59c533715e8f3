import { Logger } from '../../src/interfaces/Logger';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logConfigurationStart: jest.fn(),
    logStat: jest.fn(),
    logListing: jest.fn(),
    logOperationError: jest.fn(),
  };
}
