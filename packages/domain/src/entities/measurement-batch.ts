import type { MeasurementRecord } from './measurement-record.js';

export type FlushTrigger = 'size' | 'interval' | 'shutdown';

export interface MeasurementBatch {
  /** Idempotency key: every retry of this batch re-sends the same id. */
  readonly id: string;
  /** Drain order; batches reach the backend in ascending seq. */
  readonly seq: number;
  readonly trigger: FlushTrigger;
  readonly drainedAt: Date;
  readonly records: readonly MeasurementRecord[];
}

export type LostBatchReason = 'retries_exhausted' | 'backpressure';
