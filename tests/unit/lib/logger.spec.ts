/**
 * Unit tests for lib/logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLogLevel, isLogLevel, logger, setLogLevel } from '../../../server/src/lib/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the category icon and context on stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('info');

    logger.data('dataset', 'Parsed 3 records');

    expect(stderr).toHaveBeenCalledWith('📋 [dataset] Parsed 3 records');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops messages below the current level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    logger.graph('dataset', 'hidden');
    logger.warn('dataset', 'shown');
    logger.error('dataset', 'also shown');

    expect(stderr.mock.calls).toEqual([
      ['⚠️ [dataset] shown'],
      ['❌ [dataset] also shown'],
    ]);
  });

  it('prints nothing when silent', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    logger.error('dataset', 'hidden');

    expect(stderr).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe('silent');
  });

  it('reports a timer that was never started', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('info');

    logger.timeEnd('dataset', 'load');

    expect(stderr).toHaveBeenCalledWith('⏱️ [dataset] load: no timer found');
  });

  it('reports elapsed time in milliseconds', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1042);
    setLogLevel('info');

    logger.time('dataset', 'load');
    logger.timeEnd('dataset', 'load');

    expect(stderr).toHaveBeenCalledWith('⏱️ [dataset] load: 42ms');
  });

  it('recognises the log levels', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('toString')).toBe(false);
  });
});
