import type { LogLevel, Logger } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? '';
  return isLogLevel(level) ? level : 'info';
}

let configuredLevel: LogLevel | null = null;

/**
 * Override LOG_LEVEL with the level from the loaded Config. `null` goes back to the environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function formatLine(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();

  if (process.env.LOG_FORMAT === 'json') {
    return JSON.stringify({ ...meta, timestamp, level, message });
  }

  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}${metaStr}`;
}

/**
 * Console logger with structured metadata.
 * LOG_LEVEL sets the threshold, LOG_FORMAT=json switches to one JSON object per line.
 */
class ConsoleLogger implements Logger {
  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[configuredLevel ?? getLogLevel()]) return;

    const line = formatLine(level, message, meta);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }
}

export const logger: Logger = new ConsoleLogger();
