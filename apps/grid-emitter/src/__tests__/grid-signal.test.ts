import { describe, it, expect } from '@jest/globals';
import { BinaryPacketDecoder, encodeBinary } from '@grid-stream/adapters';

import { GridSignal } from '../grid-signal.js';

describe('GridSignal', () => {
  it('reproduces a stream from its seed', () => {
    const a = new GridSignal({ seed: 7, faultProbability: 0.05 });
    const b = new GridSignal({ seed: 7, faultProbability: 0.05 });

    for (let t = 0; t < 5; t += 0.1) {
      expect(a.sample(t)).toEqual(b.sample(t));
    }
  });

  it('stays near the nominal operating point without faults', () => {
    const signal = new GridSignal({ seed: 1, faultProbability: 0 });

    for (let i = 0; i < 200; i++) {
      const sample = signal.sample(i * 0.1);
      expect(sample.faultIndicator).toBe(0);
      expect(sample.busVoltage).toBeGreaterThan(13_800 * 0.8);
      expect(sample.busVoltage).toBeLessThan(13_800 * 1.2);
      expect(sample.busFrequency).toBeGreaterThan(49);
      expect(sample.busFrequency).toBeLessThan(51);
      expect(sample.currentMagnitude).toBeGreaterThan(0);
    }
  });

  it('flags every sample as a fault at probability 1 and sags the voltage', () => {
    const faulty = new GridSignal({ seed: 3, faultProbability: 1 });

    for (let i = 0; i < 50; i++) {
      const sample = faulty.sample(i * 0.1);
      expect(sample.faultIndicator).toBe(1);
      expect(sample.busVoltage).toBeLessThan(13_800 * 0.95);
    }
  });

  it('produces samples the ingestor decodes', () => {
    const sample = new GridSignal({ seed: 11, faultProbability: 0.5 }).sample(12.5);
    const result = new BinaryPacketDecoder().decode(encodeBinary(sample), new Date(0));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.busVoltage).toBe(sample.busVoltage);
    expect(result.record.faultIndicator).toBe(sample.faultIndicator);
  });
});
