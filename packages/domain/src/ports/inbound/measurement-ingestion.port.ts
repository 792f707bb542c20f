import type { IngestionStats } from '../../entities/ingestion-state.js';

export interface MeasurementIngestionPort {
  /** Binds the source and enters `Running`; rejects with `BindError` otherwise. */
  start(): Promise<void>;
  /** Drains, performs a final flush and releases resources. Safe to call twice. */
  stop(): Promise<void>;
  stats(): IngestionStats;
}
