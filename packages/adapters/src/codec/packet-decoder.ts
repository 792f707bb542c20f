import {
  DecodeError,
  createMeasurementRecord,
  isFaultIndicator,
} from '@grid-stream/domain';
import type {
  DataFormat,
  MeasurementField,
  MeasurementRecord,
} from '@grid-stream/domain';

export type DecodeResult =
  | { ok: true; record: MeasurementRecord }
  | { ok: false; error: DecodeError };

export interface PacketDecoder {
  readonly format: DataFormat;
  decode(payload: Buffer, receivedAt: Date): DecodeResult;
}

export function decodeFailure(error: DecodeError): DecodeResult {
  return { ok: false, error };
}

/**
 * Validates the fault flag and freezes the record. The flag is accepted when
 * it truncates to exactly 0 or 1; the record keeps the truncated value.
 */
export function finalizeRecord(raw: Record<MeasurementField, number>, ts: Date): DecodeResult {
  const flag = Math.trunc(raw.faultIndicator);
  if (!isFaultIndicator(flag)) {
    return decodeFailure(
      new DecodeError(
        'InvalidFlag',
        `fault_indicator must be 0 or 1, got ${raw.faultIndicator}`,
        'fault_indicator',
      ),
    );
  }
  return { ok: true, record: createMeasurementRecord({ ...raw, faultIndicator: flag }, ts) };
}
