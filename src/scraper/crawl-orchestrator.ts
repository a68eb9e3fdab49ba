import type {
  BatchEntry,
  BatchFailure,
  BatchResult,
  BatchSuccess,
  ItemConfig,
  NormalizedFields,
} from '../types/index.js';
import type { PriceRepository } from '../database/price-repository.js';
import { selectContent, DEFAULT_MAX_CHARS } from '../extraction/content-selector.js';
import type { StructuredExtractor } from '../extraction/extraction-client.js';
import type { ExtractorRegistry } from '../extractors/registry.js';
import { FetchError, errorMessage, errorType } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { captureError } from '../utils/sentry.js';
import type { BrowserSession, PageFetcher } from './puppeteer-client.js';

export const DEFAULT_CONCURRENCY = 5;

export interface CrawlOrchestratorDeps {
  registry: ExtractorRegistry;
  fetcher: PageFetcher;
  extractor: StructuredExtractor;
  repository: PriceRepository;
  /** Pipelines allowed in flight at once */
  concurrency?: number;
  maxContentChars?: number;
}

/**
 * Runs the extraction pipeline over a batch of tracked items.
 *
 * Every item is started at once and waits for a permit. One browser session
 * serves the whole batch. Item failures become result entries; runBatch only
 * rejects if the caller's own code does.
 */
export class CrawlOrchestrator {
  private readonly registry: ExtractorRegistry;
  private readonly fetcher: PageFetcher;
  private readonly extractor: StructuredExtractor;
  private readonly repository: PriceRepository;
  private readonly concurrency: number;
  private readonly maxContentChars: number;

  constructor(deps: CrawlOrchestratorDeps) {
    this.registry = deps.registry;
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor;
    this.repository = deps.repository;
    this.concurrency = deps.concurrency ?? DEFAULT_CONCURRENCY;
    this.maxContentChars = deps.maxContentChars ?? DEFAULT_MAX_CHARS;
  }

  async runBatch(items: ItemConfig[]): Promise<BatchResult> {
    const startTime = Date.now();

    logger.info('Starting crawl batch', {
      count: items.length,
      concurrency: this.concurrency,
    });

    let session: BrowserSession;
    try {
      session = await this.fetcher.open();
    } catch (error) {
      const results = await this.failAll(items, error);
      return this.summarize(results, startTime);
    }

    let results: BatchEntry[];
    try {
      const semaphore = new Semaphore(this.concurrency);
      results = await Promise.all(
        items.map(item => semaphore.run(() => this.processItem(session, item)))
      );
    } finally {
      await session.close().catch((closeError: unknown) => {
        logger.error('Failed to close browser session', { error: errorMessage(closeError) });
      });
    }

    return this.summarize(results, startTime);
  }

  /**
   * Full pipeline for one item. Never rejects.
   */
  private async processItem(session: BrowserSession, item: ItemConfig): Promise<BatchEntry> {
    const { url } = item;
    let itemId: number | null = null;

    try {
      const strategy = this.registry.resolve(url);
      logger.debug('Strategy resolved', { url, strategy: strategy.name });

      const page = await session.fetch(url, { colorwaySelectors: strategy.colorwaySelectors() });
      const windowText = selectContent(page.content, this.maxContentChars);

      const rawResponse = await this.extractor.extract(windowText, strategy.buildPrompt());
      const normalized = strategy.normalize(strategy.parseResponse(rawResponse));
      const data: NormalizedFields = {
        ...normalized,
        colorwayName: normalized.colorwayName ?? page.selectedColorway,
      };

      if (data.listedPrice !== null && data.salePrice !== null && data.salePrice > data.listedPrice) {
        logger.warn('Sale price is above listed price', {
          url,
          listedPrice: data.listedPrice,
          salePrice: data.salePrice,
        });
      }

      itemId = await this.repository.registerIfNew(
        url,
        data.name ?? 'Unknown',
        data.brand,
        data.category,
        item.scrapeFrequency
      );

      const recordId = await this.repository.recordPrice(itemId, {
        colorwayName: data.colorwayName,
        listedPrice: data.listedPrice,
        salePrice: data.salePrice,
        sizesAvailable: data.sizesAvailable,
        screenshotUrl: page.screenshotPath,
      });

      await this.repository.logAttempt(itemId, true);

      logger.info('Item scraped and stored', {
        url,
        itemId,
        listedPrice: data.listedPrice,
        salePrice: data.salePrice,
        colorway: data.colorwayName,
        sizes: data.sizesAvailable.length,
      });

      const success: BatchSuccess = { success: true, url, itemId, recordId, data };
      return success;
    } catch (error) {
      return this.recordFailure(url, itemId, error);
    }
  }

  private async recordFailure(
    url: string,
    itemId: number | null,
    error: unknown
  ): Promise<BatchFailure> {
    const message = errorMessage(error);
    const type = errorType(error);

    logger.error('Item scrape failed', { url, itemId, errorType: type, error: message });
    captureError(error, { url, itemId });

    try {
      await this.repository.logAttempt(itemId, false, message);
    } catch (logError) {
      logger.error('Failed to log scrape attempt', { url, itemId, error: errorMessage(logError) });
    }

    return { success: false, url, error: message, errorType: type };
  }

  private async failAll(items: ItemConfig[], error: unknown): Promise<BatchEntry[]> {
    const fetchError =
      error instanceof FetchError
        ? error
        : new FetchError(`Failed to open browser session: ${errorMessage(error)}`, { cause: error });

    logger.error('Browser session unavailable, failing batch', {
      count: items.length,
      error: fetchError.message,
    });

    return Promise.all(items.map(item => this.recordFailure(item.url, null, fetchError)));
  }

  private summarize(results: BatchEntry[], startTime: number): BatchResult {
    const succeeded = results.filter(r => r.success).length;
    const failed = results.length - succeeded;
    const durationMs = Date.now() - startTime;

    logger.info('Crawl batch completed', {
      total: results.length,
      succeeded,
      failed,
      successRate:
        results.length > 0 ? `${((succeeded / results.length) * 100).toFixed(1)}%` : 'n/a',
      durationMs,
    });

    return { results, total: results.length, succeeded, failed, durationMs };
  }
}
