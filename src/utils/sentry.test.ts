import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as Sentry from '@sentry/node';
import { captureError, flushSentry, initSentry } from './sentry.js';

const { mockScope } = vi.hoisted(() => ({
  mockScope: { setExtras: vi.fn() },
}));

vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  withScope: vi.fn((callback: (scope: typeof mockScope) => void) => callback(mockScope)),
  captureException: vi.fn(),
  flush: vi.fn().mockResolvedValue(true),
}));

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Tests run in order: Sentry starts disabled and stays enabled once initialized
describe('sentry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should stay disabled without a DSN', async () => {
    expect(initSentry({ environment: 'test' })).toBe(false);

    captureError(new Error('boom'), { url: 'https://example.com/p/1' });
    await flushSentry();

    expect(Sentry.init).not.toHaveBeenCalled();
    expect(Sentry.captureException).not.toHaveBeenCalled();
    expect(Sentry.flush).not.toHaveBeenCalled();
  });

  it('should initialize once when a DSN is set', () => {
    const config = { dsn: 'https://public@sentry.example.com/1', environment: 'test' };

    expect(initSentry(config)).toBe(true);
    expect(initSentry(config)).toBe(true);

    expect(Sentry.init).toHaveBeenCalledTimes(1);
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({ dsn: 'https://public@sentry.example.com/1', environment: 'test' })
    );
  });

  it('should report errors with their context once enabled', async () => {
    const error = new Error('boom');

    captureError(error, { url: 'https://example.com/p/1' });
    await flushSentry(500);

    expect(mockScope.setExtras).toHaveBeenCalledWith({ url: 'https://example.com/p/1' });
    expect(Sentry.captureException).toHaveBeenCalledWith(error);
    expect(Sentry.flush).toHaveBeenCalledWith(500);
  });
});
