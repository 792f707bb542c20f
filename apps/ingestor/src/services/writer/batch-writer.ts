import { WriteError } from '@grid-stream/domain';
import type {
  LostBatchReason,
  MeasurementBatch,
  MeasurementWriterPort,
  WriteAck,
} from '@grid-stream/domain';
import { abortable, createLogger, describeError } from '@grid-stream/adapters';
import type { RetryPolicy } from './retry-policy.js';

const log = createLogger('batch-writer');

export type FlushOutcome =
  | { status: 'written'; batch: MeasurementBatch; ack: WriteAck; attempts: number }
  | {
      status: 'lost';
      batch: MeasurementBatch;
      reason: LostBatchReason;
      attempts: number;
      error?: WriteError;
    };

export interface BatchWriterHooks {
  onWritten?: (outcome: Extract<FlushOutcome, { status: 'written' }>) => void;
  onLost?: (outcome: Extract<FlushOutcome, { status: 'lost' }>) => void;
}

export interface BatchWriterOptions extends BatchWriterHooks {
  writer: MeasurementWriterPort;
  policy: RetryPolicy;
  writeTimeoutMs: number;
  /** Batches allowed to wait behind the one being written. */
  maxPendingBatches: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface BatchWriterStats {
  pendingBatches: number;
  batchesWritten: number;
  recordsWritten: number;
  batchesLost: number;
  recordsLost: number;
  lastFlushAt: Date | null;
}

interface QueuedBatch {
  batch: MeasurementBatch;
  resolve: (outcome: FlushOutcome) => void;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Serial write queue in front of the storage port. One batch is written at a
 * time, in submission order; each attempt is bounded by `writeTimeoutMs` and
 * failures are retried per the policy. A batch that cannot be written is
 * reported lost and dropped.
 */
export class BatchWriter {
  private readonly queue: QueuedBatch[] = [];
  private worker: Promise<void> | null = null;
  private inFlight = false;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly counters: Omit<BatchWriterStats, 'pendingBatches'> = {
    batchesWritten: 0,
    recordsWritten: 0,
    batchesLost: 0,
    recordsLost: 0,
    lastFlushAt: null,
  };

  constructor(private readonly options: BatchWriterOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get backend(): string {
    return this.options.writer.backend;
  }

  stats(): BatchWriterStats {
    return { ...this.counters, pendingBatches: this.queue.length + (this.inFlight ? 1 : 0) };
  }

  /** Queues a batch; resolves once it is written or given up on. Never rejects. */
  submit(batch: MeasurementBatch): Promise<FlushOutcome> {
    return new Promise<FlushOutcome>((resolve) => {
      this.queue.push({ batch, resolve });
      if (this.queue.length > this.options.maxPendingBatches) {
        const dropped = this.queue.shift();
        if (dropped) {
          this.settle(dropped, { status: 'lost', batch: dropped.batch, reason: 'backpressure', attempts: 0 });
        }
      }
      this.pump();
    });
  }

  /** Resolves when nothing is queued or in flight. */
  async idle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  private pump(): void {
    if (this.worker) return;
    this.worker = this.run().finally(() => {
      this.worker = null;
      if (this.queue.length > 0) this.pump();
    });
  }

  private async run(): Promise<void> {
    for (let next = this.queue.shift(); next; next = this.queue.shift()) {
      this.inFlight = true;
      const outcome = await this.writeWithRetry(next.batch);
      this.inFlight = false;
      this.settle(next, outcome);
    }
  }

  private async writeWithRetry(batch: MeasurementBatch): Promise<FlushOutcome> {
    for (let attempt = 1; ; attempt++) {
      try {
        const ack = await this.attempt(batch);
        return { status: 'written', batch, ack, attempts: attempt };
      } catch (err) {
        const error =
          err instanceof WriteError
            ? err
            : new WriteError('Rejected', describeError(err), { cause: err });
        const decision = this.options.policy.decide(attempt);
        if (!decision.retry) {
          return { status: 'lost', batch, reason: 'retries_exhausted', attempts: attempt, error };
        }
        log.warn(`write of batch ${batch.seq} failed, retrying`, {
          attempt,
          kind: error.kind,
          error: error.message,
          delayMs: decision.delayMs,
        });
        await this.sleep(decision.delayMs);
      }
    }
  }

  private async attempt(batch: MeasurementBatch): Promise<WriteAck> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.writeTimeoutMs);
    try {
      return await abortable(
        this.options.writer.write(batch, controller.signal),
        controller.signal,
        () => new WriteError('Timeout', `write timed out after ${this.options.writeTimeoutMs}ms`),
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private settle(entry: QueuedBatch, outcome: FlushOutcome): void {
    const size = outcome.batch.records.length;
    if (outcome.status === 'written') {
      this.counters.batchesWritten++;
      this.counters.recordsWritten += size;
      this.counters.lastFlushAt = this.now();
      log.debug(`flushed batch ${outcome.batch.seq}`, {
        trigger: outcome.batch.trigger,
        records: size,
        accepted: outcome.ack.accepted,
        attempts: outcome.attempts,
      });
      this.notify(() => this.options.onWritten?.(outcome));
    } else {
      this.counters.batchesLost++;
      this.counters.recordsLost += size;
      log.error(`batch ${outcome.batch.seq} lost`, {
        reason: outcome.reason,
        records: size,
        attempts: outcome.attempts,
        kind: outcome.error?.kind,
        error: outcome.error?.message,
      });
      this.notify(() => this.options.onLost?.(outcome));
    }
    entry.resolve(outcome);
  }

  private notify(hook: () => void): void {
    try {
      hook();
    } catch (err) {
      log.error('flush hook threw', { error: describeError(err) });
    }
  }
}
