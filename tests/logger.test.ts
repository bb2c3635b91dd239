import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, noopLogger, resolveLogger, summarize } from '../src/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ level: 'warn', timestamp: false });

    logger.info('hidden');
    logger.warn('careful', 42);

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[sockline] [WARN] careful', 42);
  });

  it('should write JSON lines', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ format: 'json', timestamp: false, prefix: '[test]' });

    logger.error('failed', new Error('boom'));

    expect(error).toHaveBeenCalledWith(
      '{"level":"error","prefix":"[test]","message":"failed","data":[{"name":"Error","message":"boom"}]}'
    );
  });
});

describe('resolveLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefer an explicit logger', () => {
    expect(resolveLogger({ logger: noopLogger, debug: true })).toBe(noopLogger);
  });

  it('should log debug messages only when debug is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    resolveLogger({}, '[quiet]').debug('not shown');
    resolveLogger({ debug: true }, '[loud]').debug('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/\[loud\] \[DEBUG\] shown$/);
  });
});

describe('summarize', () => {
  it('should quote strings and bytes with escapes', () => {
    expect(summarize('*idn?\n')).toBe("'*idn?\\n'");
    expect(summarize(Buffer.from('OK\r\n'))).toBe("'OK\\r\\n'");
  });

  it('should render lists and other values', () => {
    expect(summarize([Buffer.from('a\n'), 'b'])).toBe("['a\\n', 'b']");
    expect(summarize(5)).toBe('5');
    expect(summarize(undefined)).toBe('undefined');
  });

  it('should truncate long payloads', () => {
    const text = summarize('x'.repeat(100));

    expect(text).toBe(`'${'x'.repeat(73)}[...]'`);
    expect(text).toHaveLength(80);
  });
});
