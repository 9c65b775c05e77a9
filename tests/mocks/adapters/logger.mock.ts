import { LoggerPort } from '@/domain/ports/logger';

export function createLoggerMock(): jest.Mocked<LoggerPort> {
  return {
    log: jest.fn(),
    logVerbose: jest.fn(),
    logPerformance: jest.fn(),
    logStateTransition: jest.fn(),
    logError: jest.fn(),
  };
}
