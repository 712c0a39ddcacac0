import { InvalidEncodingError } from './errors';

/**
 * Base45 alphabet (RFC 9285)
 */
const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:';

const CHAR_VALUES: ReadonlyMap<string, number> = new Map(
  Array.from(ALPHABET, (char, index) => [char, index] as const),
);

function charValue(text: string, index: number): number {
  const value = CHAR_VALUES.get(text[index]);
  if (value === undefined) {
    throw new InvalidEncodingError(
      `Invalid base45 character ${JSON.stringify(text[index])} at position ${index}`,
    );
  }
  return value;
}

/**
 * Decode a base45 string
 *
 * Three characters carry two bytes, a trailing pair carries one byte.
 */
export function base45Decode(text: string): Buffer {
  if (text.length % 3 === 1) {
    throw new InvalidEncodingError(`Invalid base45 length: ${text.length}`);
  }

  const out = Buffer.alloc(Math.floor(text.length / 3) * 2 + (text.length % 3 === 2 ? 1 : 0));
  let offset = 0;

  for (let i = 0; i < text.length; i += 3) {
    const c = charValue(text, i);
    const d = charValue(text, i + 1);

    if (i + 2 < text.length) {
      const n = c + d * 45 + charValue(text, i + 2) * 45 * 45;
      if (n > 0xffff) {
        throw new InvalidEncodingError(`Invalid base45 group at position ${i}`);
      }
      out[offset++] = n >> 8;
      out[offset++] = n & 0xff;
    } else {
      const n = c + d * 45;
      if (n > 0xff) {
        throw new InvalidEncodingError(`Invalid base45 group at position ${i}`);
      }
      out[offset++] = n;
    }
  }

  return out;
}

/**
 * Encode bytes as base45
 */
export function base45Encode(data: Uint8Array): string {
  let out = '';

  for (let i = 0; i < data.length; i += 2) {
    if (i + 1 < data.length) {
      let n = data[i] * 256 + data[i + 1];
      for (let k = 0; k < 3; k++) {
        out += ALPHABET[n % 45];
        n = Math.floor(n / 45);
      }
    } else {
      const n = data[i];
      out += ALPHABET[n % 45] + ALPHABET[Math.floor(n / 45)];
    }
  }

  return out;
}
