// Database Models
export type ScrapeFrequency = 'hourly' | 'daily' | 'weekly';

export interface Item {
  id: number;
  url: string;
  name: string;
  brand: string | null;
  category: string | null;
  scrape_frequency: ScrapeFrequency;
  created_at: string;
}

export interface PriceRecord {
  id: number;
  item_id: number;
  scraped_at: string;
  colorway_name: string | null;
  listed_price: number | null;
  sale_price: number | null;
  sizes_available: string[];
  screenshot_url: string | null;
}

export interface ScrapeLog {
  id: number;
  item_id: number | null;
  scraped_at: string;
  success: boolean;
  error_message: string | null;
}

// Item configuration
export interface ItemConfig {
  url: string;
  scrapeFrequency: ScrapeFrequency;
}

// Extraction Types

/**
 * Object recovered from the model response, before any coercion.
 */
export type RawFields = Record<string, unknown>;

export interface NormalizedFields {
  name: string | null;
  brand: string | null;
  category: string | null;
  listedPrice: number | null;
  salePrice: number | null;
  colorwayName: string | null;
  sizesAvailable: string[];
}

export interface PriceRecordInput {
  colorwayName: string | null;
  listedPrice: number | null;
  salePrice: number | null;
  sizesAvailable: string[];
  screenshotUrl: string | null;
}

// Fetch Types
export interface FetchOptions {
  /** Swatch selectors used to read the colorway selected on the page */
  colorwaySelectors?: string[];
}

export interface FetchedPage {
  url: string;
  /** Markdown-like text rendered from the page HTML */
  content: string;
  selectedColorway: string | null;
  screenshotPath: string | null;
}

// Batch Types
export interface BatchSuccess {
  success: true;
  url: string;
  itemId: number;
  recordId: number;
  data: NormalizedFields;
}

export interface BatchFailure {
  success: false;
  url: string;
  error: string;
  errorType: string;
}

export type BatchEntry = BatchSuccess | BatchFailure;

export interface BatchResult {
  /** results[i] always belongs to items[i] */
  results: BatchEntry[];
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
}

// Configuration
export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  gemini: {
    apiKey: string;
    model: string;
  };
  browser: {
    wsEndpoint?: string;
    executablePath?: string;
    pageTimeoutMs: number;
    settleDelayMs: number;
    screenshotDir?: string;
  };
  crawl: {
    concurrency: number;
    maxContentChars: number;
    itemsPath: string;
  };
  sentry: {
    dsn?: string;
    environment: string;
  };
  app: {
    logLevel: LogLevel;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
