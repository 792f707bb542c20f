import { describe, it, expect } from '@jest/globals';
import { ConfigError } from '@grid-stream/domain';

import { loadEmitterConfig } from '../emitter-config.js';

describe('loadEmitterConfig', () => {
  it('defaults to a 10 Hz binary stream to localhost:12345', () => {
    expect(loadEmitterConfig({})).toEqual({
      host: 'localhost',
      port: 12345,
      format: 'binary',
      intervalMs: 100,
      durationSec: 0,
      seed: 42,
      faultProbability: 0.05,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadEmitterConfig({
      UDP_HOST: '10.1.2.3',
      UDP_PORT: '15000',
      DATA_FORMAT: 'Json',
      EMIT_INTERVAL_MS: '20',
      EMIT_DURATION_S: '30',
      EMIT_SEED: '9',
      FAULT_PROBABILITY: '0',
    });

    expect(config).toEqual({
      host: '10.1.2.3',
      port: 15000,
      format: 'json',
      intervalMs: 20,
      durationSec: 30,
      seed: 9,
      faultProbability: 0,
    });
  });

  it('rejects a fault probability above 1', () => {
    expect(() => loadEmitterConfig({ FAULT_PROBABILITY: '1.5' })).toThrow(ConfigError);
  });

  it('rejects a non-numeric interval', () => {
    expect(() => loadEmitterConfig({ EMIT_INTERVAL_MS: 'fast' })).toThrow(
      'invalid emitter configuration: intervalMs: Expected number, received nan',
    );
  });
});
