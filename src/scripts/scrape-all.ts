#!/usr/bin/env node

import { createCrawlOrchestrator } from '../index.js';
import { loadConfigFromEnvironment } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { loadItemsConfig } from '../utils/item-config.js';
import { logger, setLogLevel } from '../utils/logger.js';
import { captureError, flushSentry, initSentry } from '../utils/sentry.js';

/**
 * Scrape every item in the items file once.
 *
 * Usage:
 *   npm run scrape-all
 *   npm run scrape-all -- --config=path/to/items.yaml
 */
async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  setLogLevel(config.app.logLevel);
  initSentry(config.sentry);

  const args = process.argv.slice(2);
  const itemsPath = args.find(arg => arg.startsWith('--config='))?.split('=')[1] || config.crawl.itemsPath;

  const items = await loadItemsConfig(itemsPath);
  console.log(`=== Scraping ${items.length} items from ${itemsPath} ===\n`);

  if (items.length === 0) {
    logger.warn('No items configured', { itemsPath });
    return;
  }

  const batch = await createCrawlOrchestrator(config).runBatch(items);

  console.log('\n=== Results ===\n');
  for (const entry of batch.results) {
    if (entry.success) {
      const { name, salePrice, listedPrice, colorwayName } = entry.data;
      console.log(`✅ ${name ?? 'Unknown'}: $${salePrice ?? '?'} (was $${listedPrice ?? '?'}) ${colorwayName ?? ''}`.trimEnd());
    } else {
      console.log(`❌ ${entry.url}: ${entry.errorType}: ${entry.error}`);
    }
  }

  console.log('');
  console.log(`  Total: ${batch.total}`);
  console.log(`  Succeeded: ${batch.succeeded}`);
  console.log(`  Failed: ${batch.failed}`);
  console.log(`  Duration: ${(batch.durationMs / 1000).toFixed(2)}s`);
}

main()
  .then(async () => {
    await flushSentry();
    process.exit(0);
  })
  .catch(async (error: unknown) => {
    console.error('\n❌ Scrape failed:', errorMessage(error));
    logger.error('Scrape failed', { error: errorMessage(error) });
    captureError(error, { script: 'scrape-all' });
    await flushSentry();
    process.exit(1);
  });
