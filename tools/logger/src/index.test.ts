import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger } from './index';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('forwards every method it was constructed with', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.debug('a');
    logger.info('b', 1);
    logger.warn('c');
    logger.error('d');

    expect(methods.debug).toHaveBeenCalledWith('a');
    expect(methods.info).toHaveBeenCalledWith('b', 1);
    expect(methods.warn).toHaveBeenCalledWith('c');
    expect(methods.error).toHaveBeenCalledWith('d');
  });

  describe('withLevel', () => {
    test('drops calls below the threshold', () => {
      const methods = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logger = Logger.withLevel(methods, 'warn');

      logger.debug('x');
      logger.info('x');
      logger.warn('x');
      logger.error('x');

      expect(methods.debug).not.toHaveBeenCalled();
      expect(methods.info).not.toHaveBeenCalled();
      expect(methods.warn).toHaveBeenCalledTimes(1);
      expect(methods.error).toHaveBeenCalledTimes(1);
    });

    test('silent drops everything', () => {
      const methods = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logger = Logger.withLevel(methods, 'silent');

      logger.error('x');

      expect(methods.error).not.toHaveBeenCalled();
    });
  });

  describe('createConsoleLogger', () => {
    test('writes info to console.info at the default level', () => {
      const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      const logger = createConsoleLogger();
      logger.info('[Test] hello');
      logger.debug('[Test] hidden');

      expect(spy).toHaveBeenCalledWith('[Test] hello');
      expect(debugSpy).not.toHaveBeenCalled();
    });
  });
});
