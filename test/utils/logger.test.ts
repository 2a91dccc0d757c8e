import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLogger, isDebugEnabled, setLogger } from '../../src/utils/logger.js';
import { consoleLogger, createLevelLogger, silentLogger, type Logger } from '../../src/types/logger.js';

function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('Logger', () => {
  afterEach(() => {
    setLogger(null);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('isDebugEnabled', () => {
    it('should be off without DEBUG', () => {
      expect(isDebugEnabled({})).toBe(false);
      expect(isDebugEnabled({ DEBUG: 'express:*' })).toBe(false);
    });

    it('should match the namespace or a wildcard', () => {
      expect(isDebugEnabled({ DEBUG: 'cloudauth' })).toBe(true);
      expect(isDebugEnabled({ DEBUG: 'express, cloudauth:transport' })).toBe(true);
      expect(isDebugEnabled({ DEBUG: '*' })).toBe(true);
    });
  });

  describe('getLogger', () => {
    it('should be silent unless DEBUG enables it', () => {
      vi.stubEnv('DEBUG', '');
      setLogger(null);
      expect(getLogger()).toBe(silentLogger);
    });

    it('should write debug output to the console when DEBUG is set', () => {
      vi.stubEnv('DEBUG', 'cloudauth');
      setLogger(null);
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      getLogger().debug({ type: 'request' }, 'hello');

      expect(spy).toHaveBeenCalledWith({ type: 'request' }, 'hello');
    });

    it('should return the logger set by the application', () => {
      const logger = recordingLogger();
      setLogger(logger);
      expect(getLogger()).toBe(logger);
    });
  });

  describe('createLevelLogger', () => {
    it('should drop messages below the minimum level', () => {
      const base = recordingLogger();
      const logger = createLevelLogger(base, 'warn');

      logger.debug('debug');
      logger.info({ a: 1 }, 'info');
      logger.warn('warn', 42);
      logger.error({ b: 2 }, 'error');

      expect(base.debug).not.toHaveBeenCalled();
      expect(base.info).not.toHaveBeenCalled();
      expect(base.warn).toHaveBeenCalledWith('warn', 42);
      expect(base.error).toHaveBeenCalledWith({ b: 2 }, 'error');
    });
  });

  describe('consoleLogger', () => {
    it('should forward to console', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      consoleLogger.warn('careful', { x: 1 });
      expect(spy).toHaveBeenCalledWith('careful', { x: 1 });
    });
  });
});
