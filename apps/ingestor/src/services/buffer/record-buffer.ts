import type { MeasurementRecord } from '@grid-stream/domain';
import type { Clock } from '@grid-stream/adapters';
import { wallClock } from '@grid-stream/adapters';

export interface FlushSignal {
  readonly reason: 'size';
  readonly size: number;
}

/**
 * Ordered accumulation of decoded records awaiting a flush. All access goes
 * through `append`/`drain`; both are synchronous, so on the event loop a
 * drain can never interleave with an append.
 */
export class RecordBuffer {
  private records: MeasurementRecord[] = [];
  private nonEmptyAt: Date | null = null;

  constructor(
    readonly maxSize: number,
    private readonly clock: Clock = wallClock,
  ) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.records.length;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  /** When the buffer last went from empty to non-empty; `null` while empty. */
  get nonEmptySince(): Date | null {
    return this.nonEmptyAt;
  }

  /** Returns a signal once the buffer holds `maxSize` records; the caller must drain before appending again. */
  append(record: MeasurementRecord): FlushSignal | null {
    if (this.records.length === 0) this.nonEmptyAt = this.clock.now();
    this.records.push(record);
    return this.records.length >= this.maxSize ? { reason: 'size', size: this.records.length } : null;
  }

  /** Swaps out everything buffered so far. An empty result means there was nothing to flush. */
  drain(): readonly MeasurementRecord[] {
    const drained = this.records;
    this.records = [];
    this.nonEmptyAt = null;
    return drained;
  }
}
