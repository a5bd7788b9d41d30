import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseLogLevel } from './config.js';
import { createLogger, formatLogLine, getLogLevel, setLogLevel } from './logger.js';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should format a line with timestamp, level and meta', () => {
    const timestamp = new Date('2024-01-02T03:04:05.000Z');

    expect(formatLogLine('warn', 'hello', { a: 1 }, timestamp)).toBe('[2024-01-02T03:04:05.000Z] [WARN] hello {"a":1}');
    expect(formatLogLine('info', 'bare', {}, timestamp)).toBe('[2024-01-02T03:04:05.000Z] [INFO] bare');
  });

  it('should serialise errors in meta by name and message', () => {
    const timestamp = new Date('2024-01-02T03:04:05.000Z');

    expect(formatLogLine('error', 'failed', { error: new TypeError('bad input') }, timestamp)).toBe(
      '[2024-01-02T03:04:05.000Z] [ERROR] failed {"error":{"name":"TypeError","message":"bad input"}}'
    );
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const log = createLogger();
    log.debug('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should prefix scoped and child loggers', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('engine').child('run').info('started');

    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0]?.[0])).toMatch(/\] \[INFO\] \[engine:run\] started$/);
  });

  it('should fall back for unknown level names', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
  });
});
