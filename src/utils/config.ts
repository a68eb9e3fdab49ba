import { config as dotenvConfig } from 'dotenv';
import type { Config, LogLevel } from '../types/index.js';
import { ConfigError } from './errors.js';

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvVar(env: Env, key: string, required = true): string {
  const value = env[key]?.trim();
  if (required && !value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getOptionalEnvVar(env: Env, key: string): string | undefined {
  return getEnvVar(env, key, false) || undefined;
}

function getPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = getEnvVar(env, key, false);
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function getLogLevel(env: Env): LogLevel {
  const raw = (getEnvVar(env, 'LOG_LEVEL', false) || 'info').toLowerCase();
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/**
 * Supabase settings only, for tools that never crawl
 */
export function loadDatabaseConfig(env: Env = process.env): Config['supabase'] {
  return {
    url: getEnvVar(env, 'SUPABASE_URL'),
    serviceKey: getEnvVar(env, 'SUPABASE_SERVICE_KEY'),
  };
}

/**
 * Build the process configuration once at start-up.
 * Components receive the result through their constructors.
 */
export function loadConfig(env: Env = process.env): Config {
  const wsEndpoint = getOptionalEnvVar(env, 'BROWSER_WS_ENDPOINT');
  const executablePath = getOptionalEnvVar(env, 'CHROME_EXECUTABLE_PATH');

  if (!wsEndpoint && !executablePath) {
    throw new ConfigError(
      'Browser not configured: set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH'
    );
  }

  return {
    supabase: loadDatabaseConfig(env),
    gemini: {
      apiKey: getEnvVar(env, 'GEMINI_API_KEY'),
      model: getEnvVar(env, 'GEMINI_MODEL', false) || 'gemini-2.0-flash',
    },
    browser: {
      wsEndpoint,
      executablePath,
      pageTimeoutMs: getPositiveInt(env, 'PAGE_TIMEOUT_MS', 60000),
      settleDelayMs: getPositiveInt(env, 'PAGE_SETTLE_DELAY_MS', 3000),
      screenshotDir: getOptionalEnvVar(env, 'SCREENSHOT_DIR'),
    },
    crawl: {
      concurrency: getPositiveInt(env, 'CRAWL_CONCURRENCY', 5),
      maxContentChars: getPositiveInt(env, 'MAX_CONTENT_CHARS', 20000),
      itemsPath: getEnvVar(env, 'ITEMS_CONFIG_PATH', false) || 'config/items.yaml',
    },
    sentry: {
      dsn: getOptionalEnvVar(env, 'SENTRY_DSN'),
      environment: getEnvVar(env, 'SENTRY_ENVIRONMENT', false) || 'development',
    },
    app: {
      logLevel: getLogLevel(env),
    },
  };
}

/**
 * Read .env into process.env, then build the configuration from it.
 */
export function loadConfigFromEnvironment(): Config {
  dotenvConfig();
  return loadConfig(process.env);
}

export function loadDatabaseConfigFromEnvironment(): Config['supabase'] {
  dotenvConfig();
  return loadDatabaseConfig(process.env);
}
