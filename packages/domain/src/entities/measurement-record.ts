/**
 * Wire order of the eleven measurement fields. Binary encode/decode and the
 * JSON key lookup both walk this table, so the order only ever lives here.
 */
export const MEASUREMENT_FIELDS = [
  { key: 'busVoltage', wire: 'bus_voltage' },
  { key: 'busFrequency', wire: 'bus_frequency' },
  { key: 'activePower', wire: 'active_power' },
  { key: 'reactivePower', wire: 'reactive_power' },
  { key: 'currentMagnitude', wire: 'current_magnitude' },
  { key: 'currentPhase', wire: 'current_phase' },
  { key: 'temperature', wire: 'temperature' },
  { key: 'loadDemand', wire: 'load_demand' },
  { key: 'generationOutput', wire: 'generation_output' },
  { key: 'gridStabilityIndex', wire: 'grid_stability_index' },
  { key: 'faultIndicator', wire: 'fault_indicator' },
] as const;

export type MeasurementField = (typeof MEASUREMENT_FIELDS)[number]['key'];
export type MeasurementWireName = (typeof MEASUREMENT_FIELDS)[number]['wire'];

/** 11 little-endian float64 values. */
export const BINARY_PAYLOAD_BYTES = MEASUREMENT_FIELDS.length * 8;

export type DataFormat = 'binary' | 'json';

export type FaultIndicator = 0 | 1;

export type MeasurementValues = {
  readonly [K in Exclude<MeasurementField, 'faultIndicator'>]: number;
} & {
  readonly faultIndicator: FaultIndicator;
};

export interface MeasurementRecord extends MeasurementValues {
  /** Point timestamp: the payload's own timestamp when it carried one, else the receive time. */
  readonly ts: Date;
}

export function isFaultIndicator(value: number): value is FaultIndicator {
  return value === 0 || value === 1;
}

export function createMeasurementRecord(values: MeasurementValues, ts: Date): MeasurementRecord {
  return Object.freeze({ ...values, ts });
}

/** Field values in wire order. */
export function orderedValues(values: MeasurementValues): number[] {
  return MEASUREMENT_FIELDS.map((field) => values[field.key]);
}

/**
 * Builds a keyed value set by asking `lookup` for each field in wire order.
 * The flag is returned raw; callers validate it before it becomes a record.
 */
export function valuesFromWire(
  lookup: (wire: MeasurementWireName, index: number) => number,
): Record<MeasurementField, number> {
  const byKey = new Map<MeasurementField, number>();
  MEASUREMENT_FIELDS.forEach((field, index) => byKey.set(field.key, lookup(field.wire, index)));
  const at = (key: MeasurementField): number => byKey.get(key) ?? Number.NaN;
  return {
    busVoltage: at('busVoltage'),
    busFrequency: at('busFrequency'),
    activePower: at('activePower'),
    reactivePower: at('reactivePower'),
    currentMagnitude: at('currentMagnitude'),
    currentPhase: at('currentPhase'),
    temperature: at('temperature'),
    loadDemand: at('loadDemand'),
    generationOutput: at('generationOutput'),
    gridStabilityIndex: at('gridStabilityIndex'),
    faultIndicator: at('faultIndicator'),
  };
}
