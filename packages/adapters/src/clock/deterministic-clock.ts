export interface Clock {
  now(): Date;
}

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the emitter's synthetic noise so a seed reproduces a stream.
 */
export class SeededRng {
  private state: number;
  private spare: number | null = null;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Standard normal sample (Box-Muller, second value cached). */
  nextGaussian(): number {
    if (this.spare !== null) {
      const cached = this.spare;
      this.spare = null;
      return cached;
    }
    const u = 1 - this.next();
    const v = this.next();
    const r = Math.sqrt(-2 * Math.log(u));
    this.spare = r * Math.sin(2 * Math.PI * v);
    return r * Math.cos(2 * Math.PI * v);
  }

  /** True with probability `p`. */
  chance(p: number): boolean {
    return this.next() < p;
  }
}

/** Manually advanced clock for tests and reproducible emitter runs. */
export class DeterministicClock implements Clock {
  private currentMs: number;

  constructor(epochMs: number) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

export const wallClock: Clock = {
  now: () => new Date(),
};
