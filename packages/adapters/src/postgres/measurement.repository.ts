import { MEASUREMENT_FIELDS, WriteError } from '@grid-stream/domain';
import type { MeasurementBatch, MeasurementWriterPort, WriteAck } from '@grid-stream/domain';
import { createLogger, describeError } from '../logging/logger.js';
import type { PointTags } from '../point-tags.js';
import { abortable } from '../util/abortable.js';
import type { ConnectablePool, QueryableClient } from './pool.js';

const log = createLogger('pg-writer');

const COLUMNS = [
  'batch_id',
  'batch_index',
  'ts',
  'measurement',
  'data_source',
  'grid_section',
  ...MEASUREMENT_FIELDS.map((field) => field.wire),
];

// Network-level failures; everything else is the server refusing the write.
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE', '57P01']);

export interface PgWriterOptions {
  /** Server-side cap on each statement; keep it at or below the write timeout. */
  statementTimeoutMs?: number;
  /** Runs once before the first successful write, e.g. schema application. Retried until it succeeds. */
  prepare?: () => Promise<void>;
}

export class PgMeasurementWriter implements MeasurementWriterPort {
  readonly backend = 'postgres';
  private prepared: Promise<void> | null = null;

  constructor(
    private readonly pool: ConnectablePool,
    private readonly measurementName: string,
    private readonly tags: PointTags,
    private readonly options: PgWriterOptions = {},
  ) {}

  /**
   * Inserts the batch in one transaction. Once `signal` aborts the
   * transaction is never committed: the connection is destroyed, which makes
   * the server discard it, and the call rejects with `Timeout` at once.
   */
  async write(batch: MeasurementBatch, signal: AbortSignal): Promise<WriteAck> {
    if (batch.records.length === 0) return { accepted: 0 };
    const aborted = () => new WriteError('Timeout', `postgres write of batch ${batch.seq} aborted`);

    const client = await this.connect(signal, aborted);

    let released = false;
    const drop = () => {
      if (released) return;
      released = true;
      client.release(true);
    };
    signal.addEventListener('abort', drop, { once: true });

    const run = (text: string, params?: unknown[]) => abortable(client.query(text, params), signal, aborted);
    const { sql, values } = this.buildInsert(batch);
    try {
      if (signal.aborted) throw aborted();
      await run('BEGIN');
      if (this.options.statementTimeoutMs !== undefined) {
        await run(`SELECT set_config('statement_timeout', $1, true)`, [
          String(Math.max(1, Math.floor(this.options.statementTimeoutMs))),
        ]);
      }
      const { rowCount } = await run(sql, values);
      if (signal.aborted) throw aborted();
      await run('COMMIT');
      return { accepted: rowCount ?? 0 };
    } catch (err) {
      if (signal.aborted) throw aborted();
      if (!released) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          log.warn('rollback failed', { error: describeError(rollbackErr) });
        });
      }
      throw toWriteError(err);
    } finally {
      signal.removeEventListener('abort', drop);
      if (!released) {
        released = true;
        client.release();
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async connect(signal: AbortSignal, aborted: () => WriteError): Promise<QueryableClient> {
    try {
      await this.prepare();
      if (signal.aborted) throw aborted();
      const client = await this.pool.connect();
      // The pool may hand over a connection after the caller gave up.
      if (signal.aborted) {
        client.release();
        throw aborted();
      }
      return client;
    } catch (err) {
      throw toWriteError(err);
    }
  }

  private prepare(): Promise<void> {
    const { prepare } = this.options;
    if (!prepare) return Promise.resolve();
    if (!this.prepared) {
      this.prepared = prepare().catch((err: unknown) => {
        this.prepared = null;
        throw err;
      });
    }
    return this.prepared;
  }

  buildInsert(batch: MeasurementBatch): { sql: string; values: unknown[] } {
    const values: unknown[] = [];
    const placeholders = batch.records.map((record, i) => {
      const base = i * COLUMNS.length;
      values.push(
        batch.id,
        i,
        record.ts,
        this.measurementName,
        this.tags.dataSource,
        this.tags.gridSection,
        ...MEASUREMENT_FIELDS.map((field) => record[field.key]),
      );
      const cols = COLUMNS.map((_, k) => `$${base + k + 1}`);
      return `(${cols.join(',')})`;
    });
    const sql =
      `INSERT INTO grid.measurements (${COLUMNS.join(', ')}) ` +
      `VALUES ${placeholders.join(',')} ` +
      `ON CONFLICT (batch_id, batch_index) DO NOTHING`;
    return { sql, values };
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function toWriteError(err: unknown): WriteError {
  if (err instanceof WriteError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);
  // SQLSTATE class 08: connection exception
  const unreachable =
    (code !== undefined && (UNREACHABLE_CODES.has(code) || code.startsWith('08'))) ||
    /connection terminated|timeout exceeded when trying to connect/i.test(message);
  return new WriteError(
    unreachable ? 'BackendUnreachable' : 'Rejected',
    `postgres write failed: ${message}`,
    { cause: err },
  );
}
