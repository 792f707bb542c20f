import type { MeasurementBatch } from '../../entities/measurement-batch.js';

export interface WriteAck {
  /** Points the backend accepted (duplicates it suppressed are not counted). */
  accepted: number;
}

/**
 * Storage write boundary. Implementations translate their own failures into
 * `WriteError` and must give up on the request when `signal` aborts.
 */
export interface MeasurementWriterPort {
  readonly backend: string;
  write(batch: MeasurementBatch, signal: AbortSignal): Promise<WriteAck>;
  close(): Promise<void>;
}
