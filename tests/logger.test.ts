import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogLevel, createLogger, parseLogLevel, setLogLevel } from '../src/logger.js';

describe('parseLogLevel', () => {
  it.each([
    ['debug', LogLevel.DEBUG],
    ['INFO', LogLevel.INFO],
    [' warn ', LogLevel.WARN],
    ['error', LogLevel.ERROR],
    ['silent', LogLevel.SILENT],
  ])('maps %j', (raw, level) => {
    expect(parseLogLevel(raw)).toBe(level);
  });

  it('returns undefined for missing or unknown values', () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.INFO);
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('Scale').info('hello');
    expect(spy).toHaveBeenCalledWith(
      expect.stringMatching(/^\d{4}-\d{2}-\d{2} [\d:.]+ \[Scale\] hello$/),
    );
  });

  it('nests child scopes', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('Scale').child('bathroom').warn('careful');
    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/\[Scale\/bathroom\] careful$/));
  });

  it('drops messages below the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel(LogLevel.ERROR);

    const logger = createLogger('Test');
    logger.debug('a');
    logger.info('b');
    logger.error('c');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('tags debug output', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel(LogLevel.DEBUG);
    createLogger('Test').debug('details');
    expect(spy).toHaveBeenCalledWith(expect.stringMatching(/\[Test:debug\] details$/));
  });
});
