import { describe, it, expect } from 'vitest';
import { deflateSync } from 'zlib';
import { base45Encode } from '../base45';
import { DecompressionError, InvalidEncodingError } from '../errors';
import { decodeTransport, stripPrefix } from '../transport';

describe('stripPrefix', () => {
  it('strips "HC1:" and "HC1"', () => {
    expect(stripPrefix('HC1:BB8')).toBe('BB8');
    expect(stripPrefix('HC1BB8')).toBe('BB8');
  });

  it('leaves unprefixed text alone', () => {
    expect(stripPrefix('BB8')).toBe('BB8');
    expect(stripPrefix(':BB8')).toBe(':BB8');
  });
});

describe('decodeTransport', () => {
  const message = Buffer.from([0xd2, 0x84, 0x43, 0xa1, 0x01, 0x26]);

  it('inflates zlib compressed data', () => {
    const text = `HC1:${base45Encode(deflateSync(message))}`;
    expect(decodeTransport(text)).toEqual(message);
  });

  it('passes uncompressed data through', () => {
    expect(decodeTransport(`HC1:${base45Encode(message)}`)).toEqual(message);
    expect(decodeTransport(base45Encode(message))).toEqual(message);
  });

  it('raises DecompressionError for a broken zlib stream', () => {
    const broken = Buffer.from([0x78, 0x9c, 0xff, 0xff, 0xff]);
    expect(() => decodeTransport(`HC1:${base45Encode(broken)}`)).toThrow(DecompressionError);
  });

  it('raises InvalidEncoding for bad base45 and empty codes', () => {
    expect(() => decodeTransport('HC1:bb8')).toThrow(InvalidEncodingError);
    expect(() => decodeTransport('HC1:')).toThrow(InvalidEncodingError);
  });
});
