import { Decoder, Encoder } from 'cbor-x';

/**
 * Shared CBOR codec
 *
 * COSE and CWT maps are keyed by integers, so maps are never turned into
 * plain objects and objects are never written as records.
 */
export const cborDecoder = new Decoder({ mapsAsObjects: false, useRecords: false });

export const cborEncoder = new Encoder({
  mapsAsObjects: false,
  useRecords: false,
  tagUint8Array: false,
});

/**
 * Encode to a standalone buffer (not a view into the encoder's scratch space)
 */
export function encodeCbor(value: unknown): Buffer {
  return Buffer.from(cborEncoder.encode(value));
}

/**
 * Narrow a decoded CBOR byte string
 */
export function asBuffer(value: unknown): Buffer | undefined {
  if (Buffer.isBuffer(value)) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value);
  }
  return undefined;
}

/**
 * Narrow a decoded CBOR map
 */
export function asMap(value: unknown): Map<unknown, unknown> | undefined {
  return value instanceof Map ? value : undefined;
}
