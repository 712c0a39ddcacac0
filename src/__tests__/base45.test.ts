import { describe, it, expect } from 'vitest';
import { base45Decode, base45Encode } from '../base45';
import { InvalidEncodingError } from '../errors';

describe('base45', () => {
  it('decodes RFC 9285 examples', () => {
    expect(base45Decode('BB8').toString('utf8')).toBe('AB');
    expect(base45Decode('%69 VD92EX0').toString('utf8')).toBe('Hello!!');
    expect(base45Decode('UJCLQE7W581').toString('utf8')).toBe('base-45');
    expect(base45Decode('QED8WEX0').toString('utf8')).toBe('ietf!');
  });

  it('encodes RFC 9285 examples', () => {
    expect(base45Encode(Buffer.from('AB'))).toBe('BB8');
    expect(base45Encode(Buffer.from('Hello!!'))).toBe('%69 VD92EX0');
    expect(base45Encode(Buffer.from('ietf!'))).toBe('QED8WEX0');
  });

  it('round-trips odd and even lengths', () => {
    for (const length of [0, 1, 2, 3, 17, 64]) {
      const bytes = Buffer.alloc(length);
      for (let i = 0; i < length; i++) {
        bytes[i] = (i * 37 + 11) & 0xff;
      }
      expect(base45Decode(base45Encode(bytes))).toEqual(bytes);
    }
  });

  it('round-trips the extreme byte values', () => {
    const bytes = Buffer.from([0xff, 0xff, 0x00, 0x00, 0xff]);
    expect(base45Decode(base45Encode(bytes))).toEqual(bytes);
  });

  it('rejects characters outside the alphabet', () => {
    expect(() => base45Decode('BB8'.replace('B', 'b'))).toThrow(InvalidEncodingError);
    expect(() => base45Decode('QED8WEX#')).toThrow(InvalidEncodingError);
  });

  it('rejects a dangling single character', () => {
    expect(() => base45Decode('BB8A')).toThrow(InvalidEncodingError);
  });

  it('rejects groups above the byte range', () => {
    // 16 + 16 * 45 + 32 * 2025 = 65536
    expect(() => base45Decode('GGW')).toThrow(InvalidEncodingError);
    // 35 + 35 * 45 = 1610
    expect(() => base45Decode('ZZ')).toThrow(InvalidEncodingError);
  });
});
