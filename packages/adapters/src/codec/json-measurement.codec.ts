import { z } from 'zod';
import { DecodeError, MEASUREMENT_FIELDS, valuesFromWire } from '@grid-stream/domain';
import type { MeasurementValues } from '@grid-stream/domain';
import { decodeFailure, finalizeRecord } from './packet-decoder.js';
import type { DecodeResult, PacketDecoder } from './packet-decoder.js';

const documentSchema = z.record(z.string(), z.unknown());

// Numbers, or decimal strings that read as one ("13800.5", "1e3"), as
// senders that stringify their values are common. Hex, octal and binary
// literals are not numbers on this wire.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const numericValueSchema = z
  .union([z.number(), z.string().trim().regex(DECIMAL).pipe(z.coerce.number())])
  .refine(Number.isFinite, { message: 'not a finite number' });

export class JsonPacketDecoder implements PacketDecoder {
  readonly format = 'json' as const;

  decode(payload: Buffer, receivedAt: Date): DecodeResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload.toString('utf8'));
    } catch (err) {
      return decodeFailure(
        new DecodeError('MalformedPayload', `invalid JSON: ${err instanceof Error ? err.message : String(err)}`),
      );
    }

    const doc = documentSchema.safeParse(parsed);
    if (!doc.success || Array.isArray(parsed)) {
      return decodeFailure(new DecodeError('MalformedPayload', 'payload is not a JSON object'));
    }

    const missing = MEASUREMENT_FIELDS.find((field) => doc.data[field.wire] == null);
    if (missing) {
      return decodeFailure(
        new DecodeError('MissingField', `missing field ${missing.wire}`, missing.wire),
      );
    }

    const invalid = MEASUREMENT_FIELDS.find(
      (field) => !numericValueSchema.safeParse(doc.data[field.wire]).success,
    );
    if (invalid) {
      return decodeFailure(
        new DecodeError('MalformedPayload', `field ${invalid.wire} is not numeric`, invalid.wire),
      );
    }

    const raw = valuesFromWire((wire) => {
      const value = numericValueSchema.safeParse(doc.data[wire]);
      return value.success ? value.data : Number.NaN;
    });
    return finalizeRecord(raw, parseTimestamp(doc.data['timestamp']) ?? receivedAt);
  }
}

/** Unparseable or absent timestamps fall back to the receive time. */
function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function encodeJson(values: MeasurementValues, timestamp?: Date): Buffer {
  const doc: Record<string, number | string> = {};
  for (const field of MEASUREMENT_FIELDS) {
    doc[field.wire] = values[field.key];
  }
  if (timestamp) doc['timestamp'] = timestamp.toISOString();
  return Buffer.from(JSON.stringify(doc), 'utf8');
}
