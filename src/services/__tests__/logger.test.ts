import { Logger, LogLevel } from '../logger.js';
import { LogShipper } from '../log-shipper.js';
import { LogBatcher } from '../log-batcher.js';
import type { LogPusher } from '../../clients/loki-client.js';

// Mock console.error to capture log output
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => {});

// Helper to safely get log output
const getLogOutput = (callIndex = 0): string => {
  const call = mockConsoleError.mock.calls[callIndex];
  return call ? String(call[0]) : '';
};

const parseLogOutput = (callIndex = 0): Record<string, unknown> => {
  const output = getLogOutput(callIndex);
  return JSON.parse(output.slice(output.indexOf('{')));
};

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    mockConsoleError.mockClear();
    logger = new Logger({
      logLevel: 'DEBUG',
      component: 'test',
      enableConsole: true
    });
  });

  afterAll(() => {
    mockConsoleError.mockRestore();
  });

  describe('log level filtering', () => {
    it('should log messages at or above the configured level', () => {
      const infoLogger = new Logger({ logLevel: 'INFO', component: 'test', enableConsole: true });

      infoLogger.debug('TEST', 'debug message');
      expect(mockConsoleError).not.toHaveBeenCalled();

      infoLogger.info('TEST', 'info message');
      expect(mockConsoleError).toHaveBeenCalledTimes(1);
    });

    it('should respect log level hierarchy', () => {
      const levels: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

      levels.forEach((configLevel, configIndex) => {
        mockConsoleError.mockClear();
        const testLogger = new Logger({ logLevel: configLevel, component: 'test', enableConsole: true });

        testLogger.debug('TEST', 'debug');
        testLogger.info('TEST', 'info');
        testLogger.warn('TEST', 'warn');
        testLogger.error('TEST', 'error');
        testLogger.fatal('TEST', 'fatal');

        expect(mockConsoleError).toHaveBeenCalledTimes(levels.length - configIndex);
      });
    });
  });

  describe('console output', () => {
    it('should write a prefixed JSON line', () => {
      logger.info('TEST_ACTION', 'something happened', { key: 'value' });

      expect(getLogOutput()).toMatch(/^\[-TEST\] \{/);
      const entry = parseLogOutput();
      expect(entry.component).toBe('test');
      expect(entry.level).toBe('INFO');
      expect(entry.action).toBe('TEST_ACTION');
      expect(entry.message).toBe('something happened');
      expect(entry.metadata).toEqual({ key: 'value' });
    });

    it('should omit metadata when none is given', () => {
      logger.warn('TEST', 'bare');
      expect(parseLogOutput()).not.toHaveProperty('metadata');
    });

    it('should stay quiet when console output is disabled', () => {
      new Logger({ logLevel: 'DEBUG', component: 'quiet', enableConsole: false }).error('TEST', 'hidden');
      expect(mockConsoleError).not.toHaveBeenCalled();
    });
  });

  describe('child', () => {
    it('should share the level under a new component name', () => {
      const child = new Logger({ logLevel: 'WARN', component: 'parent', enableConsole: true }).child('loki-client');

      child.info('TEST', 'filtered');
      child.warn('TEST', 'kept');

      expect(mockConsoleError).toHaveBeenCalledTimes(1);
      expect(getLogOutput()).toMatch(/^\[-LOKI-CLIENT\]/);
      expect(child.getStatus().component).toBe('loki-client');
    });
  });

  describe('shipping', () => {
    it('should emit each record to the shipper with flattened metadata', () => {
      const pusher: LogPusher = { pushLogs: jest.fn().mockResolvedValue(true) };
      const shipper = new LogShipper(new LogBatcher(pusher), { enabled: true, minLevel: 'DEBUG' });
      const emit = jest.spyOn(shipper, 'emit');
      const shipping = new Logger({ logLevel: 'DEBUG', component: 'tools', enableConsole: false, shipper });

      shipping.error('TOOL_ERROR', 'tool failed', { tool: 'loki_push_logs', details: { code: 1 }, missing: undefined });

      expect(emit).toHaveBeenCalledTimes(1);
      const event = emit.mock.calls[0][0];
      expect(event.message).toBe('tool failed');
      expect(event.level).toBe('ERROR');
      expect(event.logger).toBe('tools');
      expect(event.timestamp).toBeInstanceOf(Date);
      expect(event.fields).toEqual({
        action: 'TOOL_ERROR',
        tool: 'loki_push_logs',
        details: '{"code":1}',
        missing: undefined
      });
      expect(shipping.getStatus().shipping).toBe(true);
    });

    it('should ship circular and bigint metadata as strings instead of throwing', () => {
      const pusher: LogPusher = { pushLogs: jest.fn().mockResolvedValue(true) };
      const shipper = new LogShipper(new LogBatcher(pusher), { enabled: true, minLevel: 'DEBUG' });
      const emit = jest.spyOn(shipper, 'emit');
      const shipping = new Logger({ logLevel: 'DEBUG', component: 'tools', enableConsole: false, shipper });
      const err: Record<string, unknown> = { name: 'loop' };
      err.self = err;

      expect(() => shipping.error('TOOL_ERROR', 'tool failed', { err, count: 5n })).not.toThrow();

      expect(emit).toHaveBeenCalledTimes(1);
      expect(emit.mock.calls[0][0].fields).toEqual({
        action: 'TOOL_ERROR',
        err: '[object Object]',
        count: '5'
      });
    });
  });

  describe('unserializable metadata on the console', () => {
    it('should write the line with unserializable values stringified', () => {
      const err: Record<string, unknown> = { name: 'loop' };
      err.self = err;

      expect(() => logger.warn('TEST', 'cyclic', { err, count: 5n, ok: { a: 1 } })).not.toThrow();

      expect(parseLogOutput().metadata).toEqual({ err: '[object Object]', count: '5', ok: { a: 1 } });
    });

    it('should report a circular tool response without throwing', () => {
      const response: Record<string, unknown> = { rows: 1 };
      response.self = response;

      expect(() => logger.logToolSuccess('loki_query_logs', 4, response)).not.toThrow();

      expect(parseLogOutput().metadata).toEqual({
        duration_ms: 4,
        responseData: '[object Object]',
        responseSize: 15
      });
    });
  });

  describe('request and tool helpers', () => {
    it('should log request completion with the duration', () => {
      logger.logRequestSuccess('POST', 'http://loki:3100/loki/api/v1/push', 204, 12);

      const entry = parseLogOutput();
      expect(entry.action).toBe('HTTP_REQUEST_COMPLETE');
      expect(entry.message).toBe('POST http://loki:3100/loki/api/v1/push - 204 (12ms)');
    });

    it('should log request errors with the error message', () => {
      logger.logRequestError('GET', 'http://loki:3100/ready', new Error('connect ECONNREFUSED'), 3);

      const entry = parseLogOutput();
      expect(entry.action).toBe('HTTP_REQUEST_ERROR');
      expect(entry.metadata).toEqual({
        method: 'GET',
        url: 'http://loki:3100/ready',
        error: 'connect ECONNREFUSED',
        duration_ms: 3
      });
    });

    it('should log tool start with the parameter count', () => {
      logger.logToolStart('loki_query_logs', { query: '{service="api"}', limit: 5 });

      const entry = parseLogOutput();
      expect(entry.action).toBe('loki_query_logs');
      expect(entry.message).toBe('Executing loki_query_logs');
      expect(entry.metadata).toEqual({ toolParams: { query: '{service="api"}', limit: 5 }, paramCount: 2 });
    });

    it('should truncate large tool responses', () => {
      logger.logToolSuccess('loki_query_logs', 5, { data: 'x'.repeat(20000) });

      const metadata = parseLogOutput().metadata;
      expect(metadata).toEqual({
        duration_ms: 5,
        responseData: {
          _truncated: true,
          _originalSize: 20011,
          _data: '[TRUNCATED - Original size: 20011 chars]'
        },
        responseSize: 20011
      });
    });

    it('should log tool errors with the error type', () => {
      logger.logToolError('loki_push_logs', new TypeError('bad'), 7);

      const entry = parseLogOutput();
      expect(entry.level).toBe('ERROR');
      expect(entry.message).toBe('loki_push_logs failed');
      expect(entry.metadata).toMatchObject({ duration_ms: 7, errorType: 'TypeError', errorDetails: { message: 'bad' } });
    });
  });
});
