import { HttpError, InfluxDB, Point, RequestTimedOutError } from '@influxdata/influxdb-client';
import type { WriteApi } from '@influxdata/influxdb-client';
import { MEASUREMENT_FIELDS, WriteError } from '@grid-stream/domain';
import type {
  MeasurementBatch,
  MeasurementRecord,
  MeasurementWriterPort,
  WriteAck,
} from '@grid-stream/domain';
import { abortable } from '../util/abortable.js';
import type { PointTags } from '../point-tags.js';

export type InfluxWriteApi = Pick<WriteApi, 'writePoints' | 'flush' | 'close'>;

export interface InfluxConnectionOptions {
  url: string;
  token: string;
  org: string;
  bucket: string;
  timeoutMs: number;
}

// The ingestor owns retries and flush timing, so the client must neither
// retry nor flush on its own.
const CLIENT_BUFFER_LINES = 1_000_000;

export function createInfluxWriteApi(options: InfluxConnectionOptions): WriteApi {
  const client = new InfluxDB({ url: options.url, token: options.token, timeout: options.timeoutMs });
  return client.getWriteApi(options.org, options.bucket, 'ms', {
    maxRetries: 0,
    flushInterval: 0,
    batchSize: CLIENT_BUFFER_LINES,
    maxBufferLines: CLIENT_BUFFER_LINES,
  });
}

export class InfluxMeasurementWriter implements MeasurementWriterPort {
  readonly backend = 'influx';
  // Settles when the last flush handed to the client does, success or not.
  private lastFlush: Promise<void> = Promise.resolve();

  constructor(
    private readonly writeApi: InfluxWriteApi,
    private readonly measurementName: string,
    private readonly tags: PointTags,
  ) {}

  /**
   * Buffers the batch's points and flushes them. A flush the client cannot
   * cancel still runs after `signal` aborts, so the next batch waits for it to
   * settle; a batch aborted while waiting never reaches the client.
   */
  async write(batch: MeasurementBatch, signal: AbortSignal): Promise<WriteAck> {
    if (batch.records.length === 0) return { accepted: 0 };
    const aborted = () => new WriteError('Timeout', `influx write of batch ${batch.seq} aborted`);
    const flushed = this.lastFlush.then(() => {
      if (signal.aborted) throw aborted();
      this.writeApi.writePoints(batch.records.map((record) => this.toPoint(record)));
      return this.writeApi.flush();
    });
    this.lastFlush = flushed.then(
      () => undefined,
      () => undefined,
    );
    try {
      await abortable(flushed, signal, aborted);
    } catch (err) {
      throw toWriteError(err);
    }
    return { accepted: batch.records.length };
  }

  async close(): Promise<void> {
    await this.writeApi.close();
  }

  toPoint(record: MeasurementRecord): Point {
    const point = new Point(this.measurementName)
      .tag('data_source', this.tags.dataSource)
      .tag('grid_section', this.tags.gridSection)
      .timestamp(record.ts);
    for (const field of MEASUREMENT_FIELDS) {
      if (field.key === 'faultIndicator') {
        point.intField(field.wire, record.faultIndicator);
        continue;
      }
      const value = record[field.key];
      // Line protocol has no NaN/Infinity.
      if (Number.isFinite(value)) point.floatField(field.wire, value);
    }
    return point;
  }
}

export function toWriteError(err: unknown): WriteError {
  if (err instanceof WriteError) return err;
  if (err instanceof RequestTimedOutError) {
    return new WriteError('Timeout', 'influx request timed out', { cause: err });
  }
  if (err instanceof HttpError) {
    const kind = err.statusCode >= 400 && err.statusCode < 500 ? 'Rejected' : 'BackendUnreachable';
    return new WriteError(kind, `influx responded ${err.statusCode}: ${err.message}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new WriteError('BackendUnreachable', `influx write failed: ${message}`, { cause: err });
}
