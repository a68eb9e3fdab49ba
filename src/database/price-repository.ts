import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  Config,
  Item,
  PriceRecord,
  PriceRecordInput,
  ScrapeFrequency,
  ScrapeLog,
} from '../types/index.js';
import { PersistenceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getSupabaseClient } from './client.js';

// Postgres error codes surfaced by PostgREST
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

interface DbError {
  message: string;
  code?: string;
}

const idRowSchema = z.object({ id: z.number() });

const itemRowSchema = z.object({
  id: z.number(),
  url: z.string(),
  name: z.string(),
  brand: z.string().nullable(),
  category: z.string().nullable(),
  scrape_frequency: z.enum(['hourly', 'daily', 'weekly']),
  created_at: z.string(),
});

const priceRowSchema = z.object({
  id: z.number(),
  item_id: z.number(),
  scraped_at: z.string(),
  colorway_name: z.string().nullable(),
  listed_price: z.number().nullable(),
  sale_price: z.number().nullable(),
  sizes_available: z
    .array(z.string())
    .nullable()
    .transform(sizes => sizes ?? []),
  screenshot_url: z.string().nullable(),
});

const scrapeLogRowSchema = z.object({
  id: z.number(),
  item_id: z.number().nullable(),
  scraped_at: z.string(),
  success: z.boolean(),
  error_message: z.string().nullable(),
});

/**
 * Storage used by the crawl orchestrator.
 * Each call is a single statement: it either fully applies or throws PersistenceError.
 */
export interface PriceRepository {
  registerIfNew(
    url: string,
    name: string,
    brand: string | null,
    category: string | null,
    scrapeFrequency?: ScrapeFrequency
  ): Promise<number>;
  recordPrice(itemId: number, fields: PriceRecordInput): Promise<number>;
  logAttempt(itemId: number | null, success: boolean, errorMessage?: string | null): Promise<number>;
}

export class SupabasePriceRepository implements PriceRepository {
  private readonly supabase: SupabaseClient;

  constructor(config: Config['supabase']) {
    this.supabase = getSupabaseClient(config);
  }

  private fail(action: string, error: DbError, meta: Record<string, unknown> = {}): never {
    logger.error(`Failed to ${action}`, { error: error.message, code: error.code, ...meta });
    throw new PersistenceError(`Failed to ${action}: ${error.message}`, { cause: error });
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, action: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new PersistenceError(`Failed to ${action}: unexpected row shape`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  // Items

  async getItemByUrl(url: string): Promise<Item | null> {
    const { data, error } = await this.supabase
      .from('items')
      .select('*')
      .eq('url', url)
      .maybeSingle();

    if (error) this.fail('fetch item', error, { url });
    return data ? this.parse(itemRowSchema, data, 'fetch item') : null;
  }

  async getAllItems(): Promise<Item[]> {
    const { data, error } = await this.supabase
      .from('items')
      .select('*')
      .order('created_at', { ascending: false });

    if (error) this.fail('fetch items', error);
    return this.parse(z.array(itemRowSchema), data ?? [], 'fetch items');
  }

  /**
   * Lookup-or-insert keyed by URL. An existing item wins: its fields are never updated.
   */
  async registerIfNew(
    url: string,
    name: string,
    brand: string | null,
    category: string | null,
    scrapeFrequency: ScrapeFrequency = 'daily'
  ): Promise<number> {
    const existing = await this.getItemByUrl(url);
    if (existing) {
      return existing.id;
    }

    const { data, error } = await this.supabase
      .from('items')
      .insert({ url, name, brand, category, scrape_frequency: scrapeFrequency })
      .select('id')
      .single();

    if (error) {
      // Another task registered the same URL between lookup and insert
      if (error.code === UNIQUE_VIOLATION) {
        const raced = await this.getItemByUrl(url);
        if (raced) return raced.id;
      }
      this.fail('add item', error, { url });
    }

    const { id } = this.parse(idRowSchema, data, 'add item');
    logger.info('Registered new item', { itemId: id, url, name });
    return id;
  }

  // Price History

  async recordPrice(itemId: number, fields: PriceRecordInput): Promise<number> {
    const { data, error } = await this.supabase
      .from('price_history')
      .insert({
        item_id: itemId,
        colorway_name: fields.colorwayName,
        listed_price: fields.listedPrice,
        sale_price: fields.salePrice,
        sizes_available: fields.sizesAvailable,
        screenshot_url: fields.screenshotUrl,
      })
      .select('id')
      .single();

    if (error) {
      if (error.code === FOREIGN_KEY_VIOLATION) {
        logger.error('Price record references a missing item', { itemId });
        throw new PersistenceError(`Failed to insert price record: item ${itemId} does not exist`, {
          cause: error,
        });
      }
      this.fail('insert price record', error, { itemId });
    }

    return this.parse(idRowSchema, data, 'insert price record').id;
  }

  async getItemHistory(itemId: number, limit = 100): Promise<PriceRecord[]> {
    const { data, error } = await this.supabase
      .from('price_history')
      .select('*')
      .eq('item_id', itemId)
      .order('scraped_at', { ascending: false })
      .limit(limit);

    if (error) this.fail('fetch price history', error, { itemId });
    return this.parse(z.array(priceRowSchema), data ?? [], 'fetch price history');
  }

  /**
   * Most recent record for an item, optionally for one colorway
   */
  async getLatestPrice(itemId: number, colorwayName?: string): Promise<PriceRecord | null> {
    let query = this.supabase.from('price_history').select('*').eq('item_id', itemId);
    if (colorwayName) {
      query = query.eq('colorway_name', colorwayName);
    }

    const { data, error } = await query
      .order('scraped_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) this.fail('fetch latest price', error, { itemId, colorwayName });
    return data ? this.parse(priceRowSchema, data, 'fetch latest price') : null;
  }

  // Scrape Logs

  async logAttempt(
    itemId: number | null,
    success: boolean,
    errorMessage: string | null = null
  ): Promise<number> {
    const { data, error } = await this.supabase
      .from('scrape_logs')
      .insert({ item_id: itemId, success, error_message: errorMessage })
      .select('id')
      .single();

    if (error) this.fail('log scrape', error, { itemId, success });
    return this.parse(idRowSchema, data, 'log scrape').id;
  }

  async getScrapeLogs(itemId?: number, limit = 50): Promise<ScrapeLog[]> {
    let query = this.supabase.from('scrape_logs').select('*');
    if (itemId !== undefined) {
      query = query.eq('item_id', itemId);
    }

    const { data, error } = await query.order('scraped_at', { ascending: false }).limit(limit);

    if (error) this.fail('fetch scrape logs', error, { itemId });
    return this.parse(z.array(scrapeLogRowSchema), data ?? [], 'fetch scrape logs');
  }

  /**
   * Percentage (0-100) of successful attempts over the last `days` days
   */
  async getSuccessRate(itemId?: number, days = 7): Promise<number> {
    const since = new Date(Date.now() - days * 24 * 60 * 60 * 1000).toISOString();

    let query = this.supabase.from('scrape_logs').select('success').gte('scraped_at', since);
    if (itemId !== undefined) {
      query = query.eq('item_id', itemId);
    }

    const { data, error } = await query;

    if (error) this.fail('calculate success rate', error, { itemId, days });

    const rows = this.parse(
      z.array(z.object({ success: z.boolean() })),
      data ?? [],
      'calculate success rate'
    );
    if (rows.length === 0) return 0;

    const successes = rows.filter(row => row.success).length;
    return (successes / rows.length) * 100;
  }
}
