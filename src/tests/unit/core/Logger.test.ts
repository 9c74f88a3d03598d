import { Logger } from '../../../services/core/Logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    logger = new Logger('TestService');
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  describe('info', () => {
    it('should log info messages with structured format', () => {
      logger.info('Test message', { queryName: 'Query01' });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const callArg = consoleLogSpy.mock.calls[0][0];
      // [timestamp] [LEVEL] [service] message {metadata}
      expect(callArg).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[TestService\] Test message \{"queryName":"Query01"\}$/);
    });

    it('should omit metadata when there is none', () => {
      logger.info('Simple message');

      expect(consoleLogSpy.mock.calls[0][0]).toMatch(/\[INFO\] \[TestService\] Simple message$/);
    });

    it('should merge the default context into every line', () => {
      const withContext = new Logger('TestService', { context: { mode: 'LOCAL' } });

      withContext.info('Running', { queryName: 'Query02' });

      expect(consoleLogSpy.mock.calls[0][0]).toContain('{"mode":"LOCAL","queryName":"Query02"}');
    });
  });

  describe('error', () => {
    it('should log error messages to stderr', () => {
      logger.error('Error message', { error: 'test error' });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const callArg = consoleErrorSpy.mock.calls[0][0];
      expect(callArg).toContain('[ERROR]');
      expect(callArg).toContain('Error message');
      expect(callArg).toContain('"error":"test error"');
    });
  });

  describe('warn', () => {
    it('should log warning messages', () => {
      logger.warn('Warning message', { warning: 'test' });

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleWarnSpy.mock.calls[0][0]).toContain('[WARN] [TestService] Warning message {"warning":"test"}');
    });
  });

  describe('levels', () => {
    it('should log debug messages when LOG_LEVEL=debug', () => {
      process.env.LOG_LEVEL = 'debug';
      const debugLogger = new Logger('TestService');

      debugLogger.debug('Debug message', { debug: 'test' });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('[DEBUG] [TestService] Debug message');
    });

    it('should not log debug messages at the default level', () => {
      logger.debug('Debug message', { debug: 'test' });

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should suppress info and warn below an explicit error level', () => {
      const quiet = new Logger('TestService', { level: 'error' });

      quiet.info('info');
      quiet.warn('warn');
      quiet.error('error');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      const fallback = new Logger('TestService');

      fallback.debug('hidden');
      fallback.info('shown');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('shown');
    });
  });

  describe('child', () => {
    it('should keep level and context under a new service name', () => {
      const parent = new Logger('Parent', { level: 'debug', context: { runId: 'run-1' } });

      parent.child('Child').debug('from child');

      expect(consoleLogSpy.mock.calls[0][0]).toContain('[DEBUG] [Child] from child {"runId":"run-1"}');
    });
  });
});
