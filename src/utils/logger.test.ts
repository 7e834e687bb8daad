/**
 * Logger Utility Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, log, setLogLevel } from './logger';

describe('logger', () => {
  let consoleSpy: {
    debug: ReturnType<typeof vi.spyOn>;
    info: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    setLogLevel('info');
    consoleSpy = {
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  describe('createLogger', () => {
    it('logs messages with component context', () => {
      const logger = createLogger({ component: 'LandmarkBuffer' });
      logger.info('Session started');

      expect(consoleSpy.info).toHaveBeenCalledWith('[LandmarkBuffer] Session started');
    });

    it('logs messages with action context', () => {
      const logger = createLogger({ component: 'LandmarkBuffer' });
      logger.warn('Frame out of order', { action: 'append' });

      expect(consoleSpy.warn).toHaveBeenCalledWith(
        '[LandmarkBuffer] (append) Frame out of order'
      );
    });

    it('logs errors with error object', () => {
      const logger = createLogger({ component: 'TemplateResolver' });
      const error = new Error('bad json');
      logger.error('Could not parse templates', error);

      expect(consoleSpy.error).toHaveBeenCalledWith(
        '[TemplateResolver] Could not parse templates',
        error
      );
    });

    it('overrides default context with per-call context', () => {
      const logger = createLogger({ component: 'Default' });
      logger.info('Message', { component: 'Override' });

      expect(consoleSpy.info).toHaveBeenCalledWith('[Override] Message');
    });
  });

  describe('warnOnce', () => {
    it('emits a key only once per logger', () => {
      const logger = createLogger({ component: 'Buffer' });

      expect(logger.warnOnce('joint:leftWrist', 'Impossible value')).toBe(true);
      expect(logger.warnOnce('joint:leftWrist', 'Impossible value')).toBe(false);
      expect(logger.warnOnce('joint:rightWrist', 'Impossible value')).toBe(true);

      expect(consoleSpy.warn).toHaveBeenCalledTimes(2);
    });

    it('keeps keys separate between loggers', () => {
      const first = createLogger();
      const second = createLogger();

      first.warnOnce('frame', 'Dropped');
      second.warnOnce('frame', 'Dropped');

      expect(consoleSpy.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('log levels', () => {
    it('suppresses debug output at the default level', () => {
      expect(getLogLevel()).toBe('info');
      log.debug('hidden');
      expect(consoleSpy.debug).not.toHaveBeenCalled();
    });

    it('logs debug messages once enabled', () => {
      setLogLevel('debug');
      const logger = createLogger({ component: 'Test' });
      logger.debug('Debug message');
      expect(consoleSpy.debug).toHaveBeenCalledWith('[Test] Debug message');
    });

    it('silences everything at silent', () => {
      setLogLevel('silent');
      const logger = createLogger({ component: 'Test' });
      logger.warn('w');
      logger.error('e');
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('still records warnOnce keys while silent', () => {
      setLogLevel('silent');
      const logger = createLogger();
      expect(logger.warnOnce('k', 'first')).toBe(true);
      expect(logger.warnOnce('k', 'again')).toBe(false);
    });
  });
});
