#!/usr/bin/env node

import { SupabasePriceRepository } from '../database/price-repository.js';
import { loadDatabaseConfigFromEnvironment } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Print the stored price history of one tracked URL.
 *
 * Usage:
 *   npm run view-history -- <url> [--limit=20]
 */
async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const url = args.find(arg => !arg.startsWith('--'));
  const limit = parseInt(args.find(arg => arg.startsWith('--limit='))?.split('=')[1] || '20', 10);

  if (!url) {
    console.error('Usage: npm run view-history -- <url> [--limit=20]');
    return 1;
  }

  const repository = new SupabasePriceRepository(loadDatabaseConfigFromEnvironment());
  const item = await repository.getItemByUrl(url);

  if (!item) {
    console.error(`No tracked item for ${url}`);
    return 1;
  }

  console.log(`=== ${item.name} ===`);
  console.log(`  Brand: ${item.brand ?? '-'}`);
  console.log(`  Category: ${item.category ?? '-'}`);
  console.log(`  Frequency: ${item.scrape_frequency}`);
  console.log('');

  const history = await repository.getItemHistory(item.id, limit);
  if (history.length === 0) {
    console.log('No price records yet');
  }
  for (const record of history) {
    const sizes = record.sizes_available.length > 0 ? record.sizes_available.join(', ') : 'none';
    console.log(
      `${record.scraped_at}  $${record.sale_price ?? '?'} (was $${record.listed_price ?? '?'})  ` +
        `${record.colorway_name ?? '-'}  sizes: ${sizes}`
    );
  }

  const successRate = await repository.getSuccessRate(item.id);
  console.log('');
  console.log(`Success rate (7 days): ${successRate.toFixed(1)}%`);
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    logger.error('Failed to read history', { error: errorMessage(error) });
    process.exit(1);
  });
