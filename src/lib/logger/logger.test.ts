/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, createLogger, formatPrefix, shouldLog, generateRunId } from './logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'debug';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe('formatPrefix', () => {
    it('includes service and run id', () => {
      expect(formatPrefix({ service: 'GuideChecker', runId: 'abc' })).toBe(
        '[checker][GuideChecker][run:abc]'
      );
    });

    it('falls back to the bare prefix', () => {
      expect(formatPrefix()).toBe('[checker]');
    });
  });

  describe('shouldLog', () => {
    it('filters levels below LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'warn';
      expect(shouldLog('info')).toBe(false);
      expect(shouldLog('warn')).toBe(true);
      expect(shouldLog('error')).toBe(true);
    });

    it('ignores unknown LOG_LEVEL values', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(shouldLog('error')).toBe(true);
    });
  });

  describe('output', () => {
    it('writes warnings to console.warn with the service prefix', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      createLogger('FixApplicator').warn('Skipping fix');

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe('[checker][FixApplicator] Skipping fix');
    });

    it('appends data and extra context', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      new Logger({ service: 'Store', bucket: 'fixed' }).info('Stored', { id: '1' });

      expect(info).toHaveBeenCalledWith(
        '[checker][Store] Stored',
        '\nData:',
        { id: '1' },
        '\nContext:',
        { bucket: 'fixed' }
      );
    });

    it('does not write debug output when level is info', () => {
      process.env.LOG_LEVEL = 'info';
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      createLogger('Test').debug('hidden');

      expect(debug).not.toHaveBeenCalled();
    });

    it('formats errors passed to error()', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      createLogger('Test').error('Boom', new Error('bad'));

      const args = error.mock.calls[0];
      expect(args[0]).toBe('[checker][Test] Boom');
      expect(args[1]).toBe('\nError:');
      expect(args[2]).toMatchObject({ name: 'Error', message: 'bad' });
    });
  });

  describe('child', () => {
    it('merges context', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      createLogger('Analysis').child({ runId: 'r1' }).info('done');

      expect(info.mock.calls[0][0]).toBe('[checker][Analysis][run:r1] done');
    });
  });

  describe('withTiming', () => {
    it('returns the wrapped result', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      expect(createLogger('Test').withTiming('sum', () => 1 + 2)).toBe(3);
    });

    it('logs and rethrows failures', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(() =>
        createLogger('Test').withTiming('explode', () => {
          throw new Error('nope');
        })
      ).toThrow('nope');
      expect(error.mock.calls[0][0]).toBe('[checker][Test] Failed: explode');
    });
  });

  describe('generateRunId', () => {
    it('produces distinct ids', () => {
      expect(generateRunId()).not.toBe(generateRunId());
    });
  });
});
