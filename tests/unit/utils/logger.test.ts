/**
 * Logger Tests
 */

import { beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import { ConsoleLogger, createLogger, isLogLevel, silentLogger } from '../../../src/utils/logger';

describe('Logger', () => {
  let consoleSpy: Record<'warn' | 'error' | 'info' | 'debug', MockInstance<typeof console.log>>;

  beforeEach(() => {
    consoleSpy = {
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
    };
  });

  describe('ConsoleLogger', () => {
    it('should log a message without context', () => {
      new ConsoleLogger().warn('Test warning message');

      expect(consoleSpy.warn).toHaveBeenCalledWith('Test warning message');
    });

    it('should pass context through', () => {
      new ConsoleLogger().error('Payout failed', { kind: 'SigningFailed' });

      expect(consoleSpy.error).toHaveBeenCalledWith('Payout failed', { kind: 'SigningFailed' });
    });

    it('should prefix the scope', () => {
      createLogger('accounts').info('Created account');

      expect(consoleSpy.info).toHaveBeenCalledWith('[accounts] Created account');
    });

    it('should nest child scopes', () => {
      createLogger('accounts').child('payout').info('Payout recorded');

      expect(consoleSpy.info).toHaveBeenCalledWith('[accounts:payout] Payout recorded');
    });

    it('should drop messages below the level', () => {
      const logger = new ConsoleLogger({ level: 'warn' });

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
    });

    it('should hide debug output by default', () => {
      new ConsoleLogger().debug('hidden');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
    });

    it('should print nothing when silent', () => {
      const logger = new ConsoleLogger({ level: 'silent' });

      logger.error('hidden');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });

  it('should discard everything through the silent logger', () => {
    silentLogger.error('hidden');

    expect(consoleSpy.error).not.toHaveBeenCalled();
  });
});
