/**
 * In-process stand-in for the parts of the Supabase query builder the
 * repository uses. Enforces the schema constraints the code relies on:
 * unique items.url, price_history.item_id NOT NULL + FK, scrape_logs.item_id FK.
 */

export type Row = Record<string, unknown>;

export interface FakeError {
  message: string;
  code: string;
}

export interface FakeResponse {
  data: unknown;
  error: FakeError | null;
}

export type Operation = 'select' | 'insert' | 'rpc';

const TABLES = ['items', 'price_history', 'scrape_logs'] as const;

function compare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export class FakeQuery implements PromiseLike<FakeResponse> {
  private operation: Operation = 'select';
  private payload: Row | null = null;
  private columns = '*';
  private readonly filters: Array<(row: Row) => boolean> = [];
  private ordering: { column: string; ascending: boolean } | null = null;
  private maxRows: number | null = null;
  private mode: 'many' | 'single' | 'maybeSingle' = 'many';

  constructor(
    private readonly db: FakeSupabase,
    private readonly table: string
  ) {}

  select(columns = '*'): this {
    this.columns = columns;
    return this;
  }

  insert(row: Row): this {
    this.operation = 'insert';
    this.payload = row;
    return this;
  }

  eq(column: string, value: unknown): this {
    this.filters.push(row => row[column] === value);
    return this;
  }

  gte(column: string, value: string | number): this {
    this.filters.push(row => compare(row[column], value) >= 0);
    return this;
  }

  order(column: string, options: { ascending?: boolean } = {}): this {
    this.ordering = { column, ascending: options.ascending ?? true };
    return this;
  }

  limit(count: number): this {
    this.maxRows = count;
    return this;
  }

  single(): this {
    this.mode = 'single';
    return this;
  }

  maybeSingle(): this {
    this.mode = 'maybeSingle';
    return this;
  }

  then<TResult1 = FakeResponse, TResult2 = never>(
    onfulfilled?: ((value: FakeResponse) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve()
      .then(() => this.execute())
      .then(onfulfilled, onrejected);
  }

  private project(row: Row): Row {
    if (this.columns === '*') return { ...row };
    const projected: Row = {};
    for (const column of this.columns.split(',').map(c => c.trim())) {
      projected[column] = row[column];
    }
    return projected;
  }

  private execute(): FakeResponse {
    const injected = this.db.takeFailure(this.table, this.operation);
    if (injected) return { data: null, error: injected };

    if (this.operation === 'insert') {
      const inserted = this.db.insertRow(this.table, this.payload ?? {});
      if ('error' in inserted) return { data: null, error: inserted.error };
      return this.shape([this.project(inserted.row)]);
    }

    let rows = this.db.rows(this.table).filter(row => this.filters.every(f => f(row)));
    const ordering = this.ordering;
    if (ordering) {
      rows = [...rows].sort((a, b) => {
        const primary = compare(a[ordering.column], b[ordering.column]);
        // Later inserts win ties, like a serial id would
        const tie = compare(a.id, b.id);
        const result = primary !== 0 ? primary : tie;
        return ordering.ascending ? result : -result;
      });
    }
    if (this.maxRows !== null) rows = rows.slice(0, this.maxRows);

    return this.shape(rows.map(row => this.project(row)));
  }

  private shape(rows: Row[]): FakeResponse {
    if (this.mode === 'many') return { data: rows, error: null };

    if (rows.length > 1 || (this.mode === 'single' && rows.length === 0)) {
      return {
        data: null,
        error: { code: 'PGRST116', message: 'JSON object requested, multiple (or no) rows returned' },
      };
    }
    return { data: rows[0] ?? null, error: null };
  }
}

export class FakeSupabase {
  private tables = new Map<string, Row[]>();
  private nextIds = new Map<string, number>();
  private failures: Array<{ table: string; operation: Operation; error: FakeError }> = [];
  private clock = Date.parse('2026-01-01T00:00:00.000Z');
  readonly rpcCalls: Array<{ fn: string; args: Row }> = [];

  constructor() {
    this.reset();
  }

  reset(): void {
    this.tables = new Map(TABLES.map((table): [string, Row[]] => [table, []]));
    this.nextIds = new Map(TABLES.map((table): [string, number] => [table, 1]));
    this.failures = [];
    this.rpcCalls.length = 0;
    this.clock = Date.parse('2026-01-01T00:00:00.000Z');
  }

  from(table: string): FakeQuery {
    return new FakeQuery(this, table);
  }

  /** Records the call; fails only when failNext(fn, 'rpc', ...) was queued */
  async rpc(fn: string, args: Row = {}): Promise<FakeResponse> {
    this.rpcCalls.push({ fn, args });
    const injected = this.takeFailure(fn, 'rpc');
    return injected ? { data: null, error: injected } : { data: null, error: null };
  }

  rows(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }

  /** Make the next matching call return `error` instead of touching the table */
  failNext(table: string, operation: Operation, message: string, code = 'XX000'): void {
    this.failures.push({ table, operation, error: { message, code } });
  }

  takeFailure(table: string, operation: Operation): FakeError | null {
    const index = this.failures.findIndex(f => f.table === table && f.operation === operation);
    if (index === -1) return null;
    const [failure] = this.failures.splice(index, 1);
    return failure.error;
  }

  /** Delete an item and apply the ON DELETE rules */
  deleteItem(itemId: number): void {
    this.tables.set('items', this.rows('items').filter(row => row.id !== itemId));
    this.tables.set('price_history', this.rows('price_history').filter(row => row.item_id !== itemId));
    for (const log of this.rows('scrape_logs')) {
      if (log.item_id === itemId) log.item_id = null;
    }
  }

  insertRow(table: string, payload: Row): { row: Row } | { error: FakeError } {
    const rows = this.tables.get(table);
    if (!rows) {
      return { error: { code: '42P01', message: `relation "${table}" does not exist` } };
    }

    const constraintError = this.checkConstraints(table, payload);
    if (constraintError) return { error: constraintError };

    const id = this.nextIds.get(table) ?? 1;
    this.nextIds.set(table, id + 1);
    this.clock += 1000;
    const timestamp = new Date(this.clock).toISOString();

    const row: Row =
      table === 'items'
        ? { id, scrape_frequency: 'daily', created_at: timestamp, ...payload }
        : { id, scraped_at: timestamp, ...payload };

    rows.push(row);
    return { row };
  }

  private checkConstraints(table: string, payload: Row): FakeError | null {
    if (table === 'items') {
      if (this.rows('items').some(row => row.url === payload.url)) {
        return {
          code: '23505',
          message: 'duplicate key value violates unique constraint "items_url_key"',
        };
      }
      return null;
    }

    const itemId = payload.item_id ?? null;
    if (itemId === null) {
      if (table === 'price_history') {
        return { code: '23502', message: 'null value in column "item_id" violates not-null constraint' };
      }
      return null;
    }

    if (!this.rows('items').some(row => row.id === itemId)) {
      return {
        code: '23503',
        message: `insert or update on table "${table}" violates foreign key constraint`,
      };
    }
    return null;
  }
}

export const fakeSupabase = new FakeSupabase();
