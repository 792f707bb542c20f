import { describe, it, expect } from '@jest/globals';

import { DeterministicClock, SeededRng } from '../clock/deterministic-clock.js';

describe('SeededRng', () => {
  it('reproduces the same sequence for the same seed', () => {
    const a = new SeededRng(42);
    const b = new SeededRng(42);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('diverges for a different seed', () => {
    expect(new SeededRng(1).next()).not.toBe(new SeededRng(2).next());
  });

  it('stays within [0, 1)', () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 1000; i++) {
      const x = rng.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('produces gaussian samples centred near zero', () => {
    const rng = new SeededRng(99);
    let sum = 0;
    for (let i = 0; i < 10_000; i++) sum += rng.nextGaussian();
    expect(Math.abs(sum / 10_000)).toBeLessThan(0.05);
  });

  it('chance(0) never fires and chance(1) always does', () => {
    const rng = new SeededRng(3);
    for (let i = 0; i < 100; i++) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(1)).toBe(true);
    }
  });
});

describe('DeterministicClock', () => {
  it('stands still until advanced', () => {
    const clock = new DeterministicClock(5_000);
    expect(clock.now().getTime()).toBe(5_000);
    expect(clock.now().getTime()).toBe(5_000);
    clock.advance(1_500);
    expect(clock.now().getTime()).toBe(6_500);
  });
});
