import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, setLogLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel(null);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should write one JSON object per line when LOG_FORMAT is json', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Item scrape failed', { url: 'https://example.com/p/1' });

    const line: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'error',
      message: 'Item scrape failed',
      url: 'https://example.com/p/1',
    });
  });

  it('should not let metadata overwrite the line fields', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Item scrape failed', { level: 'debug', message: 'from meta', itemId: 7 });

    const line: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'error', message: 'Item scrape failed', itemId: 7 });
  });

  it('should use readable lines by default', () => {
    vi.stubEnv('LOG_FORMAT', '');
    setLogLevel('debug');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('Browser session opened', { mode: 'remote' });

    expect(String(log.mock.calls[0][0])).toMatch(
      /^\S+ INFO {2}Browser session opened {"mode":"remote"}$/
    );
  });
});
