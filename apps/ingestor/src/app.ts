import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import {
  InfluxMeasurementWriter,
  PgMeasurementWriter,
  UdpDatagramSource,
  applySchema,
  createInfluxWriteApi,
  createPacketDecoder,
  createPool,
} from '@grid-stream/adapters';
import type { MeasurementIngestionPort, MeasurementWriterPort } from '@grid-stream/domain';
import type { IngestorConfig } from './config/ingestor-config.js';
import { createStatusRouter } from './controllers/status.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { IngestionLoop } from './services/ingestion/ingestion-loop.js';

export function buildApp(ingestion: MeasurementIngestionPort): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(morgan('tiny'));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/', createStatusRouter(ingestion));

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/**
 * Builds the writer for the configured backend without contacting it; the
 * Postgres schema is applied by the first write. The caller owns the writer.
 */
export function buildWriter(config: IngestorConfig): MeasurementWriterPort {
  const tags = { dataSource: config.grid.dataSourceTag, gridSection: config.grid.gridSectionTag };
  const writeTimeoutMs = config.buffer.writeTimeoutSec * 1000;

  if (config.storage === 'postgres') {
    const pool = createPool({ connectionString: config.postgres.databaseUrl ?? '' });
    return new PgMeasurementWriter(pool, config.grid.measurementName, tags, {
      statementTimeoutMs: writeTimeoutMs,
      prepare: () => applySchema(pool),
    });
  }

  const writeApi = createInfluxWriteApi({
    url: config.influx.url,
    token: config.influx.token ?? '',
    org: config.influx.org,
    bucket: config.influx.bucket,
    timeoutMs: Math.min(config.influx.timeoutMs, writeTimeoutMs),
  });
  return new InfluxMeasurementWriter(writeApi, config.grid.measurementName, tags);
}

export function buildIngestion(config: IngestorConfig, writer: MeasurementWriterPort): IngestionLoop {
  return new IngestionLoop({
    source: new UdpDatagramSource({ host: config.udp.host, port: config.udp.port }),
    writer,
    decoder: createPacketDecoder(config.dataFormat),
    maxBufferSize: config.buffer.maxSize,
    flushIntervalMs: config.buffer.flushIntervalSec * 1000,
    retry: {
      maxRetries: config.buffer.retryAttempts,
      baseDelayMs: config.buffer.retryDelaySec * 1000,
      maxDelayMs: config.buffer.retryMaxDelaySec * 1000,
    },
    writeTimeoutMs: config.buffer.writeTimeoutSec * 1000,
    maxPendingBatches: config.buffer.maxPendingBatches,
  });
}
