#!/usr/bin/env node

import { runMigrations } from '../database/migrations.js';
import { loadDatabaseConfigFromEnvironment } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create the items, price_history and scrape_logs tables.
 * Needs an `exec_sql(sql text)` function in the Supabase project.
 */
async function main(): Promise<void> {
  const { executed, failed } = await runMigrations(loadDatabaseConfigFromEnvironment());
  if (failed > 0) {
    logger.warn('Some statements failed, existing objects were kept', { executed, failed });
  }
  logger.info('Migrations completed successfully', { executed, failed });
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error('Migrations failed', { error: errorMessage(error) });
    logger.info('Manual migration: run src/database/schema.sql in the Supabase SQL Editor');
    process.exit(1);
  });
