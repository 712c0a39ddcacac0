import { inflateSync } from 'zlib';
import { base45Decode } from './base45';
import { DecompressionError, InvalidEncodingError } from './errors';
import { HC1_PREFIX } from './types';

// First byte of a zlib stream (deflate, 32K window)
const ZLIB_MAGIC = 0x78;

/**
 * Strip the "HC1" / "HC1:" prefix, if present
 */
export function stripPrefix(text: string): string {
  if (!text.startsWith(HC1_PREFIX)) {
    return text;
  }
  const rest = text.slice(HC1_PREFIX.length);
  return rest.startsWith(':') ? rest.slice(1) : rest;
}

/**
 * QR text -> signed message bytes
 */
export function decodeTransport(text: string): Buffer {
  const body = stripPrefix(text);
  if (body.length === 0) {
    throw new InvalidEncodingError('Empty health certificate code');
  }

  const data = base45Decode(body);

  if (data[0] !== ZLIB_MAGIC) {
    return data;
  }

  try {
    return inflateSync(data);
  } catch (error) {
    throw new DecompressionError('Failed to inflate health certificate data', error);
  }
}
