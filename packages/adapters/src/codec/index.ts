import type { DataFormat, MeasurementValues } from '@grid-stream/domain';
import { BinaryPacketDecoder, encodeBinary } from './binary-measurement.codec.js';
import { JsonPacketDecoder, encodeJson } from './json-measurement.codec.js';
import type { PacketDecoder } from './packet-decoder.js';

export function createPacketDecoder(format: DataFormat): PacketDecoder {
  return format === 'json' ? new JsonPacketDecoder() : new BinaryPacketDecoder();
}

export function encodePacket(format: DataFormat, values: MeasurementValues, timestamp?: Date): Buffer {
  return format === 'json' ? encodeJson(values, timestamp) : encodeBinary(values);
}
