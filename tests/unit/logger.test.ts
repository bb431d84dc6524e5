import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('filters below the active level', () => {
    setLogLevel('warn');
    const log = createLogger('filter-test');

    expect(getLogLevel()).toBe('warn');
    expect(log.isLevelEnabled('info')).toBe(false);
    expect(log.isLevelEnabled('error')).toBe(true);
  });

  it('applies a level change to loggers created earlier', () => {
    const log = createLogger('early-test');
    expect(log.isLevelEnabled('error')).toBe(false);

    setLogLevel('debug');
    expect(log.isLevelEnabled('debug')).toBe(true);
    expect(createLogger('early-test').isLevelEnabled('debug')).toBe(true);
  });
});
