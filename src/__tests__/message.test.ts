import { describe, it, expect } from 'vitest';
import { Tag } from 'cbor-x';
import { cborDecoder, encodeCbor } from '../cbor';
import { MalformedMessageError, MissingKeyIdError } from '../errors';
import { buildSigStructure, effectiveKeyId, getAlgorithmName, parseSignedMessage } from '../message';

const KID_A = Buffer.from('0102030405060708', 'hex');
const KID_B = Buffer.from('a1a2a3a4a5a6a7a8', 'hex');
const PAYLOAD = Buffer.from('a10163414243', 'hex');
const SIGNATURE = Buffer.alloc(64, 0xab);

function coseArray(protectedMap: Map<number, unknown>, unprotectedMap: Map<number, unknown>): unknown[] {
  return [encodeCbor(protectedMap), unprotectedMap, PAYLOAD, SIGNATURE];
}

describe('parseSignedMessage', () => {
  it('parses a tagged COSE_Sign1 with a protected key ID', () => {
    const data = encodeCbor(new Tag(coseArray(new Map<number, unknown>([[1, -7], [4, KID_A]]), new Map()), 18));
    const message = parseSignedMessage(data);

    expect(message.protectedKeyId).toEqual(KID_A);
    expect(message.unprotectedKeyId).toBeUndefined();
    expect(message.algorithm).toBe(-7);
    expect(message.coseSign1.payload).toEqual(PAYLOAD);
    expect(message.coseSign1.signature).toEqual(SIGNATURE);
    expect(effectiveKeyId(message)).toEqual(KID_A);
  });

  it('parses an untagged COSE_Sign1 with an unprotected key ID', () => {
    const data = encodeCbor(coseArray(new Map([[1, -37]]), new Map([[4, KID_B]])));
    const message = parseSignedMessage(data);

    expect(message.protectedKeyId).toBeUndefined();
    expect(message.unprotectedKeyId).toEqual(KID_B);
    expect(effectiveKeyId(message)).toEqual(KID_B);
  });

  it('prefers the protected key ID', () => {
    const data = encodeCbor(coseArray(new Map([[4, KID_A]]), new Map([[4, KID_B]])));
    expect(effectiveKeyId(parseSignedMessage(data))).toEqual(KID_A);
  });

  it('treats an empty protected header as an empty map', () => {
    const data = encodeCbor([Buffer.alloc(0), new Map([[4, KID_B]]), PAYLOAD, SIGNATURE]);
    const message = parseSignedMessage(data);
    expect(message.algorithm).toBeUndefined();
    expect(message.unprotectedKeyId).toEqual(KID_B);
  });

  it('raises MissingKeyId when neither header has a key ID', () => {
    const message = parseSignedMessage(encodeCbor(coseArray(new Map([[1, -7]]), new Map())));
    expect(() => effectiveKeyId(message)).toThrow(MissingKeyIdError);
  });

  it('rejects other tags', () => {
    const data = encodeCbor(new Tag(coseArray(new Map(), new Map()), 98));
    expect(() => parseSignedMessage(data)).toThrow(MalformedMessageError);
  });

  it('rejects the wrong shape', () => {
    expect(() => parseSignedMessage(encodeCbor(new Map([[1, 2]])))).toThrow(MalformedMessageError);
    expect(() => parseSignedMessage(encodeCbor([Buffer.alloc(0), new Map(), PAYLOAD]))).toThrow(MalformedMessageError);
    expect(() => parseSignedMessage(encodeCbor([Buffer.alloc(0), new Map(), 'text', SIGNATURE]))).toThrow(
      MalformedMessageError,
    );
    expect(() => parseSignedMessage(encodeCbor([encodeCbor([1]), new Map(), PAYLOAD, SIGNATURE]))).toThrow(
      MalformedMessageError,
    );
  });

  it('rejects truncated input', () => {
    const data = encodeCbor(new Tag(coseArray(new Map([[4, KID_A]]), new Map()), 18));
    expect(() => parseSignedMessage(data.subarray(0, data.length - 10))).toThrow(MalformedMessageError);
  });
});

describe('buildSigStructure', () => {
  it('encodes ["Signature1", protected, h\'\', payload]', () => {
    const protectedHeader = encodeCbor(new Map([[1, -7]]));
    const decoded: unknown = cborDecoder.decode(buildSigStructure(protectedHeader, PAYLOAD));
    if (!Array.isArray(decoded)) {
      throw new Error('Sig_structure is not an array');
    }

    expect(decoded).toHaveLength(4);
    expect(decoded[0]).toBe('Signature1');
    expect(Buffer.from(decoded[1])).toEqual(protectedHeader);
    expect(Buffer.from(decoded[2])).toEqual(Buffer.alloc(0));
    expect(Buffer.from(decoded[3])).toEqual(PAYLOAD);
  });

  it('matches the RFC 8152 byte layout', () => {
    const sigStructure = buildSigStructure(Buffer.from('a10126', 'hex'), Buffer.from('a0', 'hex'));
    expect(sigStructure.toString('hex')).toBe('846a5369676e61747572653143a101264041a0');
  });
});

describe('getAlgorithmName', () => {
  it('names COSE algorithms', () => {
    expect(getAlgorithmName(-7)).toBe('ES256 (ECDSA w/ SHA-256)');
    expect(getAlgorithmName(-37)).toBe('PS256 (RSASSA-PSS w/ SHA-256)');
    expect(getAlgorithmName(undefined)).toBe('Not specified');
    expect(getAlgorithmName(-99)).toBe('Unknown (-99)');
  });
});
