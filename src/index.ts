import type { Config } from './types/index.js';
import { SupabasePriceRepository } from './database/price-repository.js';
import { ExtractionClient } from './extraction/extraction-client.js';
import { ExtractorRegistry } from './extractors/registry.js';
import { CrawlOrchestrator } from './scraper/crawl-orchestrator.js';
import { PuppeteerClient } from './scraper/puppeteer-client.js';

export * from './types/index.js';
export * from './utils/errors.js';
export { loadConfig, loadConfigFromEnvironment, loadDatabaseConfig } from './utils/config.js';
export { loadItemsConfig, parseItemsConfig } from './utils/item-config.js';
export { logger } from './utils/logger.js';
export { Semaphore } from './utils/semaphore.js';
export { selectContent } from './extraction/content-selector.js';
export { parsePrice, parseRawFields, parseResponse, normalizeFields } from './extraction/response-normalizer.js';
export { ExtractionClient, type StructuredExtractor } from './extraction/extraction-client.js';
export { BaseExtractor, type ExtractionStrategy } from './extractors/base-extractor.js';
export { AbercrombieExtractor } from './extractors/abercrombie-extractor.js';
export { ExtractorRegistry } from './extractors/registry.js';
export { PuppeteerClient, type BrowserSession, type PageFetcher } from './scraper/puppeteer-client.js';
export { CrawlOrchestrator, type CrawlOrchestratorDeps } from './scraper/crawl-orchestrator.js';
export { SupabasePriceRepository, type PriceRepository } from './database/price-repository.js';
export { runMigrations } from './database/migrations.js';

/**
 * Wire the production collaborators from one Config
 */
export function createCrawlOrchestrator(config: Config): CrawlOrchestrator {
  return new CrawlOrchestrator({
    registry: new ExtractorRegistry(),
    fetcher: new PuppeteerClient(config.browser),
    extractor: new ExtractionClient(config.gemini),
    repository: new SupabasePriceRepository(config.supabase),
    concurrency: config.crawl.concurrency,
    maxContentChars: config.crawl.maxContentChars,
  });
}
