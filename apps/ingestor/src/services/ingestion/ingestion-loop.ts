import { randomUUID } from 'node:crypto';
import { BindError } from '@grid-stream/domain';
import type {
  Datagram,
  DatagramSourcePort,
  DecodeError,
  DecodeErrorKind,
  FlushTrigger,
  IngestionState,
  IngestionStats,
  MeasurementIngestionPort,
  MeasurementWriterPort,
} from '@grid-stream/domain';
import { createLogger, describeError, wallClock } from '@grid-stream/adapters';
import type { Clock, PacketDecoder } from '@grid-stream/adapters';
import { RecordBuffer } from '../buffer/record-buffer.js';
import { FlushScheduler } from '../scheduler/flush-scheduler.js';
import { BatchWriter } from '../writer/batch-writer.js';
import type { BatchWriterHooks, FlushOutcome } from '../writer/batch-writer.js';
import { RetryPolicy } from '../writer/retry-policy.js';
import type { RetryPolicyOptions } from '../writer/retry-policy.js';

const log = createLogger('ingestion');

const PACKET_MILESTONE = 1000;
const DECODE_LOG_WINDOW_MS = 1000;

export interface IngestionLoopOptions {
  source: DatagramSourcePort;
  writer: MeasurementWriterPort;
  decoder: PacketDecoder;
  maxBufferSize: number;
  flushIntervalMs: number;
  retry: RetryPolicyOptions;
  writeTimeoutMs: number;
  maxPendingBatches: number;
  hooks?: BatchWriterHooks;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  newBatchId?: () => string;
}

/**
 * Owns the datagram source and the storage writer for the lifetime of the
 * service: Starting → Running → Draining → Stopped.
 *
 * The receive path appends to the buffer and drains it on the size trigger;
 * the scheduler drains it on the interval trigger. Both hand the drained
 * batch to one serial BatchWriter, so batches reach the backend in drain
 * order.
 */
export class IngestionLoop implements MeasurementIngestionPort {
  private current: IngestionState = 'Starting';
  private readonly buffer: RecordBuffer;
  private readonly scheduler: FlushScheduler;
  private readonly batchWriter: BatchWriter;
  private readonly shutdown = new AbortController();
  private readonly clock: Clock;
  private readonly newBatchId: () => string;
  private receiving: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private seq = 0;
  private packetsReceived = 0;
  private readonly decodeErrors: Record<DecodeErrorKind, number> = {
    LengthMismatch: 0,
    MalformedPayload: 0,
    MissingField: 0,
    InvalidFlag: 0,
  };
  private readonly decodeLog = new Map<DecodeErrorKind, { lastMs: number; suppressed: number }>();

  constructor(private readonly options: IngestionLoopOptions) {
    this.clock = options.clock ?? wallClock;
    this.newBatchId = options.newBatchId ?? randomUUID;
    this.buffer = new RecordBuffer(options.maxBufferSize, this.clock);
    this.scheduler = new FlushScheduler({
      intervalMs: options.flushIntervalMs,
      hasPending: () => !this.buffer.isEmpty,
      onFire: () => void this.flush('interval'),
    });
    this.batchWriter = new BatchWriter({
      writer: options.writer,
      policy: new RetryPolicy(options.retry),
      writeTimeoutMs: options.writeTimeoutMs,
      maxPendingBatches: options.maxPendingBatches,
      sleep: options.sleep,
      now: () => this.clock.now(),
      ...options.hooks,
    });
  }

  get state(): IngestionState {
    return this.current;
  }

  async start(): Promise<void> {
    if (this.current !== 'Starting') {
      throw new Error(`cannot start ingestion in state ${this.current}`);
    }
    const { source } = this.options;
    try {
      await source.bind();
    } catch (err) {
      // stop() during the bind has already released everything.
      if (this.current !== 'Starting') return;
      this.current = 'Stopped';
      await this.release();
      throw err instanceof BindError ? err : new BindError(source.host, source.port, { cause: err });
    }
    if (this.current !== 'Starting') return;
    this.current = 'Running';
    log.info('running', {
      host: source.host,
      port: source.port,
      format: this.options.decoder.format,
      backend: this.options.writer.backend,
      maxBufferSize: this.options.maxBufferSize,
      flushIntervalMs: this.options.flushIntervalMs,
    });
    this.receiving = this.receiveLoop();
  }

  /** Stops receiving, flushes what is buffered (best effort) and releases resources. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.drainAndStop();
    return this.stopping;
  }

  stats(): IngestionStats {
    const writer = this.batchWriter.stats();
    return {
      state: this.current,
      host: this.options.source.host,
      port: this.options.source.port,
      format: this.options.decoder.format,
      packetsReceived: this.packetsReceived,
      datagramsDropped: this.options.source.droppedDatagrams,
      decodeErrors: { ...this.decodeErrors },
      bufferDepth: this.buffer.size,
      pendingBatches: writer.pendingBatches,
      batchesWritten: writer.batchesWritten,
      recordsWritten: writer.recordsWritten,
      batchesLost: writer.batchesLost,
      recordsLost: writer.recordsLost,
      lastFlushAt: writer.lastFlushAt,
    };
  }

  private async receiveLoop(): Promise<void> {
    while (this.current === 'Running') {
      let datagram: Datagram | null;
      try {
        datagram = await this.options.source.receive(this.shutdown.signal);
      } catch (err) {
        log.error('error receiving datagram', { error: describeError(err) });
        continue;
      }
      if (!datagram) break;
      this.handleDatagram(datagram);
    }
  }

  private handleDatagram(datagram: Datagram): void {
    this.packetsReceived++;
    if (this.packetsReceived % PACKET_MILESTONE === 0) {
      log.info(`received ${this.packetsReceived} packets`, {
        from: `${datagram.remoteAddress}:${datagram.remotePort}`,
      });
    }

    const result = this.options.decoder.decode(datagram.payload, datagram.receivedAt);
    if (!result.ok) {
      this.recordDecodeError(result.error);
      return;
    }

    const signal = this.buffer.append(result.record);
    this.scheduler.notifyAppended();
    if (signal) void this.flush('size');
  }

  /**
   * Drains the buffer and hands the batch to the writer. Drain and submit
   * happen in the same synchronous step; an empty drain is a no-op.
   */
  private flush(trigger: FlushTrigger): Promise<FlushOutcome> | null {
    const records = this.buffer.drain();
    this.scheduler.notifyDrained(this.buffer.isEmpty);
    if (records.length === 0) return null;

    this.seq++;
    return this.batchWriter.submit({
      id: this.newBatchId(),
      seq: this.seq,
      trigger,
      drainedAt: this.clock.now(),
      records,
    });
  }

  private recordDecodeError(error: DecodeError): void {
    this.decodeErrors[error.kind]++;
    const nowMs = this.clock.now().getTime();
    const gate = this.decodeLog.get(error.kind);
    if (gate && nowMs - gate.lastMs < DECODE_LOG_WINDOW_MS) {
      gate.suppressed++;
      return;
    }
    log.warn(`discarded datagram: ${error.message}`, {
      kind: error.kind,
      total: this.decodeErrors[error.kind],
      suppressed: gate?.suppressed ?? 0,
    });
    this.decodeLog.set(error.kind, { lastMs: nowMs, suppressed: 0 });
  }

  private async drainAndStop(): Promise<void> {
    if (this.current === 'Stopped') return;
    if (this.current === 'Starting') {
      this.current = 'Stopped';
      await this.release();
      return;
    }

    this.current = 'Draining';
    log.info('draining', { buffered: this.buffer.size });
    this.scheduler.cancel();
    this.shutdown.abort();
    await this.receiving;

    const final = this.flush('shutdown');
    if (final) {
      const outcome = await final;
      log.info(`final flush ${outcome.status}`, { records: outcome.batch.records.length });
    }
    await this.batchWriter.idle();
    await this.release();
    this.current = 'Stopped';
    log.info('stopped', { ...this.stats() });
  }

  private async release(): Promise<void> {
    try {
      await this.options.source.close();
    } catch (err) {
      log.error('failed to close datagram source', { error: describeError(err) });
    }
    try {
      await this.options.writer.close();
    } catch (err) {
      log.error('failed to close storage writer', { error: describeError(err) });
    }
  }
}
