import {
  BINARY_PAYLOAD_BYTES,
  DecodeError,
  orderedValues,
  valuesFromWire,
} from '@grid-stream/domain';
import type { MeasurementValues } from '@grid-stream/domain';
import { decodeFailure, finalizeRecord } from './packet-decoder.js';
import type { DecodeResult, PacketDecoder } from './packet-decoder.js';

const FLOAT64_BYTES = 8;

export class BinaryPacketDecoder implements PacketDecoder {
  readonly format = 'binary' as const;

  decode(payload: Buffer, receivedAt: Date): DecodeResult {
    if (payload.length !== BINARY_PAYLOAD_BYTES) {
      return decodeFailure(
        new DecodeError(
          'LengthMismatch',
          `expected ${BINARY_PAYLOAD_BYTES} bytes, got ${payload.length}`,
        ),
      );
    }
    const raw = valuesFromWire((_wire, index) => payload.readDoubleLE(index * FLOAT64_BYTES));
    return finalizeRecord(raw, receivedAt);
  }
}

/** 11 little-endian doubles; the flag is written as 0.0 or 1.0. */
export function encodeBinary(values: MeasurementValues): Buffer {
  const out = Buffer.alloc(BINARY_PAYLOAD_BYTES);
  orderedValues(values).forEach((value, index) => out.writeDoubleLE(value, index * FLOAT64_BYTES));
  return out;
}
