/**
 * Error taxonomy for the extraction and ingestion pipeline.
 *
 * Everything except ConfigError is per-item: the crawl orchestrator catches it,
 * records a failed batch entry and moves on.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'NO_STRATEGY'
  | 'FETCH_ERROR'
  | 'EXTRACTION_SERVICE_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'PERSISTENCE_ERROR';

export class PriceTrackerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad item declaration or environment. Fatal before any scraping starts. */
export class ConfigError extends PriceTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export class NoStrategyError extends PriceTrackerError {
  readonly url: string;

  constructor(url: string) {
    super('NO_STRATEGY', `No extraction strategy matches URL: ${url}`);
    this.url = url;
  }
}

export class FetchError extends PriceTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
  }
}

export class ExtractionServiceError extends PriceTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_SERVICE_ERROR', message, options);
  }
}

export class MalformedResponseError extends PriceTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_RESPONSE', message, options);
  }
}

/**
 * Storage write or read failed. A failure after registration can leave an item
 * without a price record.
 */
export class PersistenceError extends PriceTrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_ERROR', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorType(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError';
}
