import pg from 'pg';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { createLogger, describeError } from '../logging/logger.js';

const { Pool } = pg;

const log = createLogger('pg-pool');

export interface QueryableClient {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
  /** `destroy` closes the connection instead of returning it to the pool. */
  release(destroy?: boolean): void;
}

/** The slice of `pg.Pool` the writer needs; lets tests hand in a fake. */
export interface ConnectablePool {
  connect(): Promise<QueryableClient>;
  end(): Promise<void>;
}

export interface PoolOptions {
  connectionString: string;
  max?: number;
  applicationName?: string;
}

export function createPool(options: PoolOptions): pg.Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 4,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: options.applicationName ?? 'grid-stream-ingestor',
  });
  pool.on('error', (err) => {
    log.error('unexpected error on idle client', { error: describeError(err) });
  });
  return pool;
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  pool: ConnectablePool,
  fn: (client: QueryableClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      log.warn('rollback failed', { error: describeError(rollbackErr) });
    });
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Apply `db/postgres/schema.sql`. Every statement is `IF NOT EXISTS`, so this
 * is safe to repeat.
 */
export async function applySchema(pool: ConnectablePool): Promise<void> {
  const schemaPath = resolve(__dirname, '../../../../db/postgres/schema.sql');

  let schemaContent: string;
  try {
    schemaContent = readFileSync(schemaPath, 'utf-8');
  } catch {
    // Fallback path for dist layout
    schemaContent = readFileSync(resolve(process.cwd(), 'db/postgres/schema.sql'), 'utf-8');
  }

  const statements = schemaContent
    .split(';')
    .map((s) => s.replace(/--.*$/gm, '').trim())
    .filter((s) => s.length > 0);

  await withTransaction(pool, async (client) => {
    for (const stmt of statements) {
      await client.query(stmt);
    }
  });
  log.info(`schema applied (${statements.length} statements)`);
}
