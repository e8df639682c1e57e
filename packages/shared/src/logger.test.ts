import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('defaults to info', () => {
    expect(getLogLevel()).toBe('info');
  });

  it('prefixes messages with a timestamp and scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const extra = { volume: -15.5 };

    createLogger('Test').info('hello', extra);

    expect(info).toHaveBeenCalledTimes(1);
    const [line, arg] = info.mock.calls[0] ?? [];
    expect(line).toMatch(/^\d{4}-\d\d-\d\dT\d\d:\d\d:\d\d\.\d{3}Z \[Test\] hello$/);
    expect(arg).toBe(extra);
  });

  it('drops debug messages at the default level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('Test').debug('hidden');

    expect(debug).not.toHaveBeenCalled();
  });

  it('prints debug messages once the level is lowered', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('debug');

    createLogger('Test').debug('shown');

    expect(debug).toHaveBeenCalledWith(expect.stringMatching(/\[Test\] shown$/));
  });

  it('always prints warnings and errors', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');

    const log = createLogger('Test');
    log.info('quiet');
    log.warn('careful');
    log.error('broken');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
