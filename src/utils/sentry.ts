import * as Sentry from '@sentry/node';
import type { Config } from '../types/index.js';
import { logger } from './logger.js';

let sentryEnabled = false;

/**
 * Enable error reporting when a DSN is configured. Safe to call more than once.
 */
export function initSentry(config: Config['sentry']): boolean {
  if (sentryEnabled || !config.dsn) {
    return sentryEnabled;
  }

  Sentry.init({
    dsn: config.dsn,
    environment: config.environment,
    // Capture 100% of error events
    sampleRate: 1.0,
    tracesSampleRate: 0,
    serverName: process.env.HOSTNAME || 'price-tracker-local',
  });

  sentryEnabled = true;
  logger.info('Sentry initialized for error tracking', { environment: config.environment });
  return sentryEnabled;
}

// Manual error capture helper
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Wait for queued events to be sent. Scripts call this before exiting.
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
