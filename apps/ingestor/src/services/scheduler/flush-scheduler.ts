import { createLogger } from '@grid-stream/adapters';

const log = createLogger('flush-scheduler');

export interface FlushSchedulerOptions {
  intervalMs: number;
  /** Called when the interval elapses with the buffer still non-empty. */
  onFire: () => void;
  /** Checked at fire time; an empty buffer makes the fire a no-op. */
  hasPending: () => boolean;
}

/**
 * One-shot timer measured from the buffer's empty → non-empty transition.
 * It is not restarted by further appends, so a steady trickle of records
 * still flushes once per interval.
 */
export class FlushScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private cancelled = false;
  private fires = 0;

  constructor(private readonly options: FlushSchedulerOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
  }

  get armed(): boolean {
    return this.timer !== null;
  }

  get fireCount(): number {
    return this.fires;
  }

  /** Call after every append; arms the timer if it is not already running. */
  notifyAppended(): void {
    if (this.cancelled || this.timer) return;
    this.timer = setTimeout(() => this.fire(), this.options.intervalMs);
  }

  /** Call after every drain; a drain that emptied the buffer restarts the cycle. */
  notifyDrained(bufferEmpty: boolean): void {
    if (bufferEmpty) this.disarm();
  }

  /** Permanently stops the scheduler. */
  cancel(): void {
    this.cancelled = true;
    this.disarm();
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private fire(): void {
    this.timer = null;
    if (this.cancelled || !this.options.hasPending()) return;
    this.fires++;
    log.debug('interval elapsed, requesting flush', { intervalMs: this.options.intervalMs });
    this.options.onFire();
  }
}
