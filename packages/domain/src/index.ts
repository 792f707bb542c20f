// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/measurement-record.js';
export * from './entities/measurement-batch.js';
export * from './entities/ingestion-state.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/decode-error.js';
export * from './errors/write-error.js';
export * from './errors/lifecycle-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/measurement-ingestion.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/measurement-writer.port.js';
export * from './ports/outbound/datagram-source.port.js';
