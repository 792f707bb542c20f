import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { WriteError } from '@grid-stream/domain';
import type { MeasurementWriterPort } from '@grid-stream/domain';

import { BatchWriter } from '../services/writer/batch-writer.js';
import type { BatchWriterHooks } from '../services/writer/batch-writer.js';
import { RetryPolicy } from '../services/writer/retry-policy.js';
import { GatedWriter, RecordingWriter, flushAsync, makeBatch } from './fakes.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const unreachable = () => new WriteError('BackendUnreachable', 'connection refused');

function build(
  writer: MeasurementWriterPort,
  overrides: { maxRetries?: number; maxPendingBatches?: number; writeTimeoutMs?: number } & BatchWriterHooks = {},
) {
  const delays: number[] = [];
  const batchWriter = new BatchWriter({
    writer,
    policy: new RetryPolicy({ maxRetries: overrides.maxRetries ?? 3, baseDelayMs: 1000, maxDelayMs: 30_000 }),
    writeTimeoutMs: overrides.writeTimeoutMs ?? 60_000,
    maxPendingBatches: overrides.maxPendingBatches ?? 100,
    sleep: async (ms) => {
      delays.push(ms);
    },
    now: () => new Date('2024-05-01T12:00:05.000Z'),
    onWritten: overrides.onWritten,
    onLost: overrides.onLost,
  });
  return { batchWriter, delays };
}

// ═══════════════════════════════════════════════════════════════════════════════

describe('BatchWriter', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('writes a batch and counts it', async () => {
    const writer = new RecordingWriter();
    const { batchWriter } = build(writer);

    const outcome = await batchWriter.submit(makeBatch(1, 5));

    expect(outcome).toMatchObject({ status: 'written', attempts: 1, ack: { accepted: 5 } });
    expect(batchWriter.stats()).toEqual({
      pendingBatches: 0,
      batchesWritten: 1,
      recordsWritten: 5,
      batchesLost: 0,
      recordsLost: 0,
      lastFlushAt: new Date('2024-05-01T12:00:05.000Z'),
    });
  });

  it('writes one batch at a time in submission order', async () => {
    const writer = new GatedWriter();
    const { batchWriter } = build(writer);

    const outcomes = [1, 2, 3].map((seq) => batchWriter.submit(makeBatch(seq)));
    await flushAsync();
    expect(writer.started.map((b) => b.seq)).toEqual([1]);
    expect(batchWriter.stats().pendingBatches).toBe(3);

    writer.releaseNext();
    await flushAsync();
    expect(writer.started.map((b) => b.seq)).toEqual([1, 2]);

    writer.releaseNext();
    await flushAsync();
    writer.releaseNext();

    const settled = await Promise.all(outcomes);
    expect(settled.map((o) => o.status)).toEqual(['written', 'written', 'written']);
    expect(writer.started.map((b) => b.seq)).toEqual([1, 2, 3]);
  });

  it('retries with exponential backoff and re-sends the same batch id', async () => {
    const writer = new RecordingWriter();
    writer.failures = [unreachable(), unreachable()];
    const { batchWriter, delays } = build(writer);

    const outcome = await batchWriter.submit(makeBatch(1, 2));

    expect(outcome).toMatchObject({ status: 'written', attempts: 3 });
    expect(delays).toEqual([1000, 2000]);
    expect(writer.attempts.map((b) => b.id)).toEqual(['batch-1', 'batch-1', 'batch-1']);
    expect(writer.written).toHaveLength(1);
  });

  it('reports a batch lost exactly once after the retries run out', async () => {
    const writer = new RecordingWriter();
    writer.failAlways = unreachable();
    const lost: number[] = [];
    const { batchWriter, delays } = build(writer, { onLost: (o) => lost.push(o.batch.seq) });

    const outcome = await batchWriter.submit(makeBatch(4, 3));

    expect(outcome).toMatchObject({ status: 'lost', reason: 'retries_exhausted', attempts: 4 });
    expect(outcome.status === 'lost' && outcome.error?.kind).toBe('BackendUnreachable');
    expect(writer.attempts).toHaveLength(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(lost).toEqual([4]);
    expect(batchWriter.stats()).toMatchObject({ batchesLost: 1, recordsLost: 3, batchesWritten: 0, lastFlushAt: null });
  });

  it('keeps going with the next batch after a loss', async () => {
    const writer = new RecordingWriter();
    writer.failures = [unreachable()];
    const { batchWriter } = build(writer, { maxRetries: 0 });

    const first = batchWriter.submit(makeBatch(1));
    const second = batchWriter.submit(makeBatch(2));

    expect((await first).status).toBe('lost');
    expect((await second).status).toBe('written');
  });

  it('treats an unexpected throw as a rejected write', async () => {
    const writer = new RecordingWriter();
    writer.failAlways = new Error('serializer exploded');
    const { batchWriter } = build(writer, { maxRetries: 0 });

    const outcome = await batchWriter.submit(makeBatch(1));

    expect(outcome.status === 'lost' && outcome.error?.kind).toBe('Rejected');
    expect(outcome.status === 'lost' && outcome.error?.message).toBe('serializer exploded');
  });

  it('times out an attempt that never settles', async () => {
    jest.useFakeTimers();
    const writer = new RecordingWriter();
    writer.hang = true;
    const { batchWriter } = build(writer, { maxRetries: 0, writeTimeoutMs: 5000 });

    const pending = batchWriter.submit(makeBatch(1));
    jest.advanceTimersByTime(5000);
    const outcome = await pending;

    expect(outcome.status === 'lost' && outcome.error?.kind).toBe('Timeout');
    expect(outcome.status === 'lost' && outcome.error?.message).toBe('write timed out after 5000ms');
  });

  it('drops the oldest waiting batch when the queue overflows', async () => {
    const writer = new GatedWriter();
    const lostReasons: string[] = [];
    const { batchWriter } = build(writer, {
      maxPendingBatches: 1,
      onLost: (o) => lostReasons.push(`${o.batch.seq}:${o.reason}`),
    });

    const first = batchWriter.submit(makeBatch(1));
    const second = batchWriter.submit(makeBatch(2));
    const third = batchWriter.submit(makeBatch(3));

    expect(await second).toMatchObject({ status: 'lost', reason: 'backpressure', attempts: 0 });
    expect(lostReasons).toEqual(['2:backpressure']);

    writer.releaseNext();
    await flushAsync();
    writer.releaseNext();

    expect((await first).status).toBe('written');
    expect((await third).status).toBe('written');
    expect(writer.started.map((b) => b.seq)).toEqual([1, 3]);
  });

  it('survives a hook that throws', async () => {
    const writer = new RecordingWriter();
    const { batchWriter } = build(writer, {
      onWritten: () => {
        throw new Error('hook failure');
      },
    });

    await expect(batchWriter.submit(makeBatch(1))).resolves.toMatchObject({ status: 'written' });
  });

  it('idle() resolves once everything submitted has settled', async () => {
    const writer = new RecordingWriter();
    const { batchWriter } = build(writer);

    void batchWriter.submit(makeBatch(1));
    void batchWriter.submit(makeBatch(2));
    await batchWriter.idle();

    expect(writer.written.map((b) => b.seq)).toEqual([1, 2]);
    expect(batchWriter.stats().pendingBatches).toBe(0);
  });

  it('resolves idle() immediately when nothing was submitted', async () => {
    const { batchWriter } = build(new RecordingWriter());
    await expect(batchWriter.idle()).resolves.toBeUndefined();
  });

  it('exposes the backend name', () => {
    expect(build(new RecordingWriter()).batchWriter.backend).toBe('memory');
  });
});
