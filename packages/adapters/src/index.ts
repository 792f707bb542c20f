// ─── Logging ──────────────────────────────────────────────────────────────────
export { createLogger, setLogLevel, describeError, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// ─── Wire Codecs ──────────────────────────────────────────────────────────────
export { createPacketDecoder, encodePacket } from './codec/index.js';
export { BinaryPacketDecoder, encodeBinary } from './codec/binary-measurement.codec.js';
export { JsonPacketDecoder, encodeJson } from './codec/json-measurement.codec.js';
export type { DecodeResult, PacketDecoder } from './codec/packet-decoder.js';

// ─── UDP ──────────────────────────────────────────────────────────────────────
export { UdpDatagramSource } from './udp/udp-datagram.source.js';
export type { UdpDatagramSourceOptions } from './udp/udp-datagram.source.js';

// ─── Storage Writers ──────────────────────────────────────────────────────────
export type { PointTags } from './point-tags.js';
export { InfluxMeasurementWriter, createInfluxWriteApi } from './influx/influx-measurement.writer.js';
export type { InfluxWriteApi, InfluxConnectionOptions } from './influx/influx-measurement.writer.js';
export { createPool, withTransaction, applySchema } from './postgres/pool.js';
export type { ConnectablePool, QueryableClient, PoolOptions } from './postgres/pool.js';
export { PgMeasurementWriter } from './postgres/measurement.repository.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SeededRng, wallClock } from './clock/deterministic-clock.js';
export type { Clock } from './clock/deterministic-clock.js';

// ─── Utilities ────────────────────────────────────────────────────────────────
export { abortable } from './util/abortable.js';
