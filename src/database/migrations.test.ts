import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFileSync } from 'fs';
import { fakeSupabase } from '../test-utils/fake-supabase.js';
import { SCHEMA_PATH, runMigrations, splitStatements } from './migrations.js';

vi.mock('./client.js', async () => {
  const { fakeSupabase } = await import('../test-utils/fake-supabase.js');
  return { getSupabaseClient: () => fakeSupabase };
});

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const CONFIG = { url: 'http://localhost:54321', serviceKey: 'test-service-key' };

describe('splitStatements', () => {
  it('should drop comments and empty chunks', () => {
    const sql = '-- header\n\nCREATE TABLE a (id INT);\n-- note\nCREATE INDEX b ON a(id);\n';

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id INT)', 'CREATE INDEX b ON a(id)']);
  });

  it('should find every table and index in the schema file', () => {
    const statements = splitStatements(readFileSync(SCHEMA_PATH, 'utf-8'));

    expect(statements).toHaveLength(5);
    expect(statements[0].startsWith('CREATE TABLE IF NOT EXISTS items')).toBe(true);
  });

  it('should store prices without scale or range limits', () => {
    const priceTable = splitStatements(readFileSync(SCHEMA_PATH, 'utf-8'))[1];

    expect(priceTable).toContain('listed_price NUMERIC,');
    expect(priceTable).toContain('sale_price NUMERIC,');
    expect(priceTable).not.toContain('CHECK');
  });
});

describe('runMigrations', () => {
  beforeEach(() => {
    fakeSupabase.reset();
  });

  it('should execute each statement through exec_sql', async () => {
    const result = await runMigrations(CONFIG, 'CREATE TABLE a (id INT);\nCREATE TABLE b (id INT);');

    expect(result).toEqual({ executed: 2, failed: 0 });
    expect(fakeSupabase.rpcCalls).toEqual([
      { fn: 'exec_sql', args: { sql: 'CREATE TABLE a (id INT)' } },
      { fn: 'exec_sql', args: { sql: 'CREATE TABLE b (id INT)' } },
    ]);
  });

  it('should count failed statements and continue', async () => {
    fakeSupabase.failNext('exec_sql', 'rpc', 'permission denied');

    const result = await runMigrations(CONFIG, 'CREATE TABLE a (id INT);\nCREATE TABLE b (id INT);');

    expect(result).toEqual({ executed: 1, failed: 1 });
    expect(fakeSupabase.rpcCalls).toHaveLength(2);
  });

  it('should fail when a table cannot be read back', async () => {
    fakeSupabase.failNext('price_history', 'select', 'relation "price_history" does not exist', '42P01');

    await expect(runMigrations(CONFIG, 'SELECT 1;')).rejects.toThrow(
      'Failed to verify table price_history: relation "price_history" does not exist'
    );
  });
});
