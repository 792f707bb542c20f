/**
 * In-process stand-ins for the ingestion ports, shared by the service tests.
 */

import { createMeasurementRecord } from '@grid-stream/domain';
import type {
  Datagram,
  DatagramSourcePort,
  MeasurementBatch,
  MeasurementRecord,
  MeasurementValues,
  MeasurementWriterPort,
  WriteAck,
} from '@grid-stream/domain';

export const NOMINAL: MeasurementValues = {
  busVoltage: 13800,
  busFrequency: 50,
  activePower: 10000,
  reactivePower: 3000,
  currentMagnitude: 500,
  currentPhase: 0,
  temperature: 25,
  loadDemand: 9500,
  generationOutput: 10500,
  gridStabilityIndex: 1,
  faultIndicator: 0,
};

export function makeRecord(busVoltage: number, ts = new Date('2024-05-01T12:00:00.000Z')): MeasurementRecord {
  return createMeasurementRecord({ ...NOMINAL, busVoltage }, ts);
}

export function makeBatch(seq: number, size = 1): MeasurementBatch {
  return {
    id: `batch-${seq}`,
    seq,
    trigger: 'size',
    drainedAt: new Date('2024-05-01T12:00:00.000Z'),
    records: Array.from({ length: size }, (_, i) => makeRecord(seq * 100 + i)),
  };
}

/** Lets every queued promise continuation run. */
export async function flushAsync(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

// ─── Datagram source ──────────────────────────────────────────────────────────

export class FakeDatagramSource implements DatagramSourcePort {
  readonly host = '127.0.0.1';
  readonly port = 12345;
  bindError: Error | null = null;
  /** When set, `bind()` waits for it before completing. */
  bindGate: Promise<void> | null = null;
  droppedDatagrams = 0;
  bound = false;
  closed = false;
  private readonly queue: Datagram[] = [];
  private waiter: ((datagram: Datagram | null) => void) | null = null;

  async bind(): Promise<void> {
    if (this.bindGate) await this.bindGate;
    if (this.bindError) throw this.bindError;
    this.bound = true;
  }

  deliver(payload: Buffer, receivedAt = new Date()): void {
    const datagram: Datagram = { payload, receivedAt, remoteAddress: '127.0.0.1', remotePort: 40000 };
    if (this.waiter) this.waiter(datagram);
    else this.queue.push(datagram);
  }

  receive(signal: AbortSignal): Promise<Datagram | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed || signal.aborted) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiter = null;
        resolve(null);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = (datagram) => {
        signal.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(datagram);
      };
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.waiter?.(null);
  }
}

// ─── Storage writer ───────────────────────────────────────────────────────────

/**
 * Records every write attempt. `failures` is consumed one entry per attempt
 * before writes start succeeding; `hang` makes attempts never settle.
 */
export class RecordingWriter implements MeasurementWriterPort {
  readonly backend = 'memory';
  readonly attempts: MeasurementBatch[] = [];
  readonly written: MeasurementBatch[] = [];
  failures: Error[] = [];
  failAlways: Error | null = null;
  hang = false;
  closed = false;

  write(batch: MeasurementBatch, _signal: AbortSignal): Promise<WriteAck> {
    this.attempts.push(batch);
    if (this.hang) return new Promise<WriteAck>(() => undefined);
    const failure = this.failAlways ?? this.failures.shift();
    if (failure) return Promise.reject(failure);
    this.written.push(batch);
    return Promise.resolve({ accepted: batch.records.length });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** A writer whose writes resolve only when the test releases them, in call order. */
export class GatedWriter implements MeasurementWriterPort {
  readonly backend = 'gated';
  readonly started: MeasurementBatch[] = [];
  private readonly gates: Array<() => void> = [];

  write(batch: MeasurementBatch): Promise<WriteAck> {
    this.started.push(batch);
    return new Promise((resolve) => {
      this.gates.push(() => resolve({ accepted: batch.records.length }));
    });
  }

  releaseNext(): void {
    this.gates.shift()?.();
  }

  async close(): Promise<void> {}
}
