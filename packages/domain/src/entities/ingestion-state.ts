import type { DataFormat } from './measurement-record.js';
import type { DecodeErrorKind } from '../errors/decode-error.js';

export type IngestionState = 'Starting' | 'Running' | 'Draining' | 'Stopped';

export interface IngestionStats {
  state: IngestionState;
  host: string;
  port: number;
  format: DataFormat;
  packetsReceived: number;
  datagramsDropped: number;
  decodeErrors: Record<DecodeErrorKind, number>;
  bufferDepth: number;
  pendingBatches: number;
  batchesWritten: number;
  recordsWritten: number;
  batchesLost: number;
  recordsLost: number;
  lastFlushAt: Date | null;
}
