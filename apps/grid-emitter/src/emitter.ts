import 'dotenv/config';
import { createSocket } from 'node:dgram';
import { createLogger, describeError, encodePacket } from '@grid-stream/adapters';
import { loadEmitterConfig } from './emitter-config.js';
import { GridSignal } from './grid-signal.js';

/**
 * Grid emitter: stands in for the simulation model during local runs.
 *
 * Env vars:
 *   UDP_HOST           ingestor address (default: localhost)
 *   UDP_PORT           ingestor port (default: 12345)
 *   DATA_FORMAT        binary | json (default: binary)
 *   EMIT_INTERVAL_MS   send interval in ms (default: 100)
 *   EMIT_DURATION_S    stop after this many seconds, 0 = run forever
 *   EMIT_SEED          RNG seed (default: 42)
 *   FAULT_PROBABILITY  per-sample fault chance (default: 0.05)
 */

const log = createLogger('emitter');

function main(): void {
  const config = loadEmitterConfig();
  const signal = new GridSignal({ seed: config.seed, faultProbability: config.faultProbability });
  const socket = createSocket(config.host.includes(':') ? 'udp6' : 'udp4');
  const startedAt = Date.now();
  let sent = 0;
  let stopped = false;
  const statusEvery = Math.max(1, Math.round(10_000 / config.intervalMs));

  log.info(`streaming to ${config.host}:${config.port}`, {
    format: config.format,
    rateHz: 1000 / config.intervalMs,
    durationSec: config.durationSec || 'unbounded',
  });

  const stop = () => {
    if (stopped) return;
    stopped = true;
    clearInterval(timer);
    socket.close();
    log.info(`streaming complete, ${sent} samples sent`);
  };

  const timer = setInterval(() => {
    const elapsedSec = (Date.now() - startedAt) / 1000;
    if (config.durationSec > 0 && elapsedSec >= config.durationSec) {
      stop();
      return;
    }
    const packet = encodePacket(config.format, signal.sample(elapsedSec), new Date());
    socket.send(packet, config.port, config.host, (err) => {
      if (err) log.error('send failed', { error: describeError(err) });
    });
    sent++;
    if (sent % statusEvery === 0) {
      log.info(`sent ${sent} samples in ${elapsedSec.toFixed(1)}s`);
    }
  }, config.intervalMs);

  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

try {
  main();
} catch (err) {
  log.error('fatal startup error', { error: describeError(err) });
  process.exit(1);
}
