import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Config } from '../types/index.js';
import { logger } from '../utils/logger.js';

let supabaseClient: SupabaseClient | null = null;

/**
 * Shared Supabase client. Every query is its own HTTP request, so callers
 * never hold a connection open between writes.
 */
export function getSupabaseClient(config: Config['supabase']): SupabaseClient {
  if (!supabaseClient) {
    logger.info('Initializing Supabase client');
    supabaseClient = createClient(config.url, config.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }
  return supabaseClient;
}
