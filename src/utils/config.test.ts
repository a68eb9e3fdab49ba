import { describe, it, expect } from 'vitest';
import { ConfigError } from './errors.js';
import { loadConfig, loadDatabaseConfig } from './config.js';

const BASE_ENV = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_KEY: 'test-service-key',
  GEMINI_API_KEY: 'test-api-key',
  CHROME_EXECUTABLE_PATH: '/usr/bin/chromium',
};

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      supabase: { url: 'http://localhost:54321', serviceKey: 'test-service-key' },
      gemini: { apiKey: 'test-api-key', model: 'gemini-2.0-flash' },
      browser: {
        wsEndpoint: undefined,
        executablePath: '/usr/bin/chromium',
        pageTimeoutMs: 60000,
        settleDelayMs: 3000,
        screenshotDir: undefined,
      },
      crawl: { concurrency: 5, maxContentChars: 20000, itemsPath: 'config/items.yaml' },
      sentry: { dsn: undefined, environment: 'development' },
      app: { logLevel: 'info' },
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...BASE_ENV,
      CHROME_EXECUTABLE_PATH: undefined,
      BROWSER_WS_ENDPOINT: 'ws://localhost:9222',
      GEMINI_MODEL: 'gemini-1.5-pro',
      CRAWL_CONCURRENCY: '3',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.browser.wsEndpoint).toBe('ws://localhost:9222');
    expect(config.browser.executablePath).toBeUndefined();
    expect(config.gemini.model).toBe('gemini-1.5-pro');
    expect(config.crawl.concurrency).toBe(3);
    expect(config.app.logLevel).toBe('debug');
  });

  it('should require the Supabase and Gemini credentials', () => {
    expect(() => loadConfig({ ...BASE_ENV, SUPABASE_URL: '' })).toThrow(
      'Missing required environment variable: SUPABASE_URL'
    );
    expect(() => loadConfig({ ...BASE_ENV, GEMINI_API_KEY: undefined })).toThrow(ConfigError);
  });

  it('should require a browser', () => {
    expect(() => loadConfig({ ...BASE_ENV, CHROME_EXECUTABLE_PATH: undefined })).toThrow(
      'Browser not configured: set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH'
    );
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => loadConfig({ ...BASE_ENV, CRAWL_CONCURRENCY: '0' })).toThrow(
      'CRAWL_CONCURRENCY must be a positive integer, got "0"'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ ...BASE_ENV, LOG_LEVEL: 'verbose' })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, got "verbose"'
    );
  });
});

describe('loadDatabaseConfig', () => {
  it('should not need browser or model settings', () => {
    expect(
      loadDatabaseConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_KEY: 'test-service-key' })
    ).toEqual({ url: 'http://localhost:54321', serviceKey: 'test-service-key' });
  });
});
