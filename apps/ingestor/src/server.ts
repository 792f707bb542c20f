import 'dotenv/config';
import type { Server } from 'http';
import { createLogger, describeError, setLogLevel } from '@grid-stream/adapters';
import { loadConfig, redactConfig } from './config/ingestor-config.js';
import { buildApp, buildIngestion, buildWriter } from './app.js';

const log = createLogger('server');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info('configuration loaded', redactConfig(config));

  const writer = buildWriter(config);
  const ingestion = buildIngestion(config, writer);

  // BindError propagates to the fatal handler below
  await ingestion.start();

  let httpServer: Server | null = null;
  if (config.statusPort > 0) {
    httpServer = buildApp(ingestion).listen(config.statusPort, () => {
      log.info(`status listening on http://0.0.0.0:${config.statusPort}`);
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);
    httpServer?.close();
    await ingestion.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  log.error('fatal startup error', { error: describeError(err) });
  process.exit(1);
});
