import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { Config } from '../types/index.js';
import { PersistenceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getSupabaseClient } from './client.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Beside this module; `npm run build` copies it into dist/database/ */
export const SCHEMA_PATH = join(__dirname, 'schema.sql');
export const TABLES = ['items', 'price_history', 'scrape_logs'] as const;

export interface MigrationResult {
  executed: number;
  failed: number;
}

/**
 * Split a SQL file into statements, dropping `--` comment lines
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map(chunk =>
      chunk
        .split('\n')
        .filter(line => !line.trim().startsWith('--'))
        .join('\n')
        .trim()
    )
    .filter(statement => statement.length > 0);
}

/**
 * Apply schema.sql through the `exec_sql` RPC, then check every table answers.
 * Statements are idempotent, so a re-run only repeats no-ops.
 */
export async function runMigrations(
  config: Config['supabase'],
  schemaSql: string = readFileSync(SCHEMA_PATH, 'utf-8')
): Promise<MigrationResult> {
  const supabase = getSupabaseClient(config);
  const statements = splitStatements(schemaSql);

  logger.info(`Executing ${statements.length} SQL statements`);

  let failed = 0;
  for (let i = 0; i < statements.length; i++) {
    const statement = statements[i];
    const { error } = await supabase.rpc('exec_sql', { sql: statement });

    if (error) {
      failed++;
      logger.warn(`Statement ${i + 1} failed via RPC`, {
        error: error.message,
        statement: statement.substring(0, 100),
      });
    } else {
      logger.debug(`Statement ${i + 1} executed successfully`);
    }
  }

  for (const table of TABLES) {
    const { error } = await supabase.from(table).select('id').limit(1);
    if (error) {
      throw new PersistenceError(`Failed to verify table ${table}: ${error.message}`, {
        cause: error,
      });
    }
  }

  logger.info('Database tables verified', { tables: TABLES.length });
  return { executed: statements.length - failed, failed };
}
