import { LokiLoggerService } from './loki-logger.service';
import winston from 'winston';
import LokiTransport from 'winston-loki';

// Mock winston and winston-loki
jest.mock('winston', () => ({
  createLogger: jest.fn().mockImplementation(() => ({
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn(),
    error: jest.fn(),
  })),
  transports: {
    Console: jest.fn(),
  },
  format: {
    combine: jest.fn((...args: unknown[]) => args),
    colorize: jest.fn(() => ({ mock: 'colorize' })),
    simple: jest.fn(() => ({ mock: 'simple' })),
    json: jest.fn(() => ({ mock: 'json' })),
  },
}));

jest.mock('winston-loki', () => {
  return jest.fn().mockImplementation(() => ({}));
});

describe('LokiLoggerService', () => {
  let loggerService: LokiLoggerService;
  const fixedTimestamp = '2026-03-02T09:15:00.000Z';

  const mockRequest = {
    method: 'POST',
    url: '/api/query',
    headers: {
      'x-api-key': 'test-secret',
      'content-type': 'application/json',
    },
    body: {
      query: 'Do I need a food handler permit?',
      token: 'test-token',
    },
  };

  const expectedRedactedRequest = {
    method: 'POST',
    url: '/api/query',
    headers: {
      'x-api-key': '*****',
      'content-type': 'application/json',
    },
    body: {
      query: 'Do I need a food handler permit?',
      token: '*****',
    },
  };

  const mockStack =
    'Error: Test error\n    at Object.<anonymous> (test.js:10:15)';

  beforeEach(() => {
    jest.spyOn(Date.prototype, 'toISOString').mockReturnValue(fixedTimestamp);
    loggerService = new LokiLoggerService('test-job', 'test-app', null);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should log an info message', async () => {
    await loggerService.log('Search phase finished');
    expect(loggerService['logger'].info).toHaveBeenCalledWith(
      'ℹ️ [LOG] Search phase finished',
    );
  });

  it('should prefix the Nest context when one is passed', async () => {
    await loggerService.warn('Scoped search failed', 'SearchOrchestratorService');
    expect(loggerService['logger'].warn).toHaveBeenCalledWith(
      '⚠️ [WARN] [SearchOrchestratorService] Scoped search failed',
    );
  });

  it('should log a debug message', async () => {
    await loggerService.debug('Test debug message');
    expect(loggerService['logger'].debug).toHaveBeenCalledWith(
      '🐛 [DEBUG] Test debug message',
    );
  });

  it('should log an error message with a stack trace and redacted request', async () => {
    await loggerService.error('Synthesis failed', mockStack, mockRequest);

    expect(loggerService['logger'].error).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: fixedTimestamp,
        level: 'error',
        message: '❌ [ERROR] Synthesis failed',
        stack: 'Error: Test error\n    (test.js:10:15)',
        request: expectedRedactedRequest,
      }),
    );
  });

  it('should treat a string third argument as the Nest context', async () => {
    await loggerService.error('Boom', undefined, 'RequestCoordinatorService');

    expect(loggerService['logger'].error).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: fixedTimestamp,
        level: 'error',
        message: '❌ [ERROR] [RequestCoordinatorService] Boom',
      }),
    );
  });

  it('should clean stack traces by removing node_modules and limiting depth', () => {
    const rawStack = `
      Error: Test error
          at Object.<anonymous> (/Users/test/project/node_modules/some-package/index.js:10:15)
          at Object.<anonymous> (/Users/test/project/src/test.js:5:10)
          at Module._compile (internal/modules/cjs/loader.js:1158:30)
          at Object.Module._extensions..js (internal/modules/cjs/loader.js:1178:10)
          at Module.load (internal/modules/cjs/loader.js:1002:32)
    `;
    const cleanedStack = loggerService['cleanStackTrace'](rawStack);
    expect(cleanedStack).toBe(
      'Error: Test error\n    (some-package/index.js:10:15)\n    (project/src/test.js:5:10)',
    );
  });

  it('should add a Loki transport only when a host is configured', () => {
    new LokiLoggerService('test-job', 'test-app', 'http://loki.test:3100');

    expect(LokiTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'http://loki.test:3100',
        labels: { job: 'test-job', app: 'test-app' },
      }),
    );
  });

  it('should fall back to the Console transport when there is no Loki host', () => {
    expect(LokiTransport).not.toHaveBeenCalled();
    expect(winston.transports.Console).toHaveBeenCalledWith(
      expect.objectContaining({
        format: expect.anything(),
      }),
    );
  });
});
