/**
 * Logger Tests
 */

import {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  setLevelFromEnv,
  disableLogging
} from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    Logger.setLevel(LogLevel.WARN);
  });

  it('should suppress messages below the current level', () => {
    Logger.setLevel(LogLevel.WARN);
    Logger.debug('hidden');
    Logger.info('hidden');
    Logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should prefix scoped messages', () => {
    Logger.setLevel(LogLevel.DEBUG);
    createLogger('generator').debug('dropped bedroom');

    expect(logSpy).toHaveBeenCalledWith('[DEBUG] [generator] dropped bedroom');
  });

  it('should print nothing once disabled', () => {
    disableLogging();
    Logger.warn('hidden');

    expect(warnSpy).not.toHaveBeenCalled();
  });

  describe('parseLogLevel', () => {
    it('should map names case-insensitively', () => {
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(' warning ')).toBe(LogLevel.WARN);
      expect(parseLogLevel('silent')).toBe(LogLevel.NONE);
    });

    it('should return undefined for unknown or missing names', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe('setLevelFromEnv', () => {
    it('should apply a valid level and ignore an invalid one', () => {
      setLevelFromEnv({ LAYOUT_LOG_LEVEL: 'info' });
      expect(Logger.getLevel()).toBe(LogLevel.INFO);

      setLevelFromEnv({ LAYOUT_LOG_LEVEL: 'loud' });
      expect(Logger.getLevel()).toBe(LogLevel.INFO);
    });
  });
});
