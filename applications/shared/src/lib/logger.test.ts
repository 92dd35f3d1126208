import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel, setLogSink } from './logger';

describe('logger', () => {
  afterEach(() => {
    setLogSink();
    setLogLevel('info');
  });

  it('should prefix lines with the tag', () => {
    const sink = vi.fn();
    setLogSink(sink);

    createLogger('Transport').info('Playing "Intro"', 42);

    expect(sink).toHaveBeenCalledWith('info', '[Transport] Playing "Intro"', [42]);
  });

  it('should drop lines below the current level', () => {
    const sink = vi.fn();
    setLogSink(sink);
    setLogLevel('warn');

    const log = createLogger('Session');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');

    expect(sink).toHaveBeenCalledTimes(2);
    expect(getLogLevel()).toBe('warn');
  });

  it('should silence everything at silent', () => {
    const sink = vi.fn();
    setLogSink(sink);
    setLogLevel('silent');

    createLogger('Session').error('nope');

    expect(sink).not.toHaveBeenCalled();
  });

  it('should recognize level names only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
