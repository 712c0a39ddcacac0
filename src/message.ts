import { Tag } from 'cbor-x';
import { asBuffer, asMap, cborDecoder, encodeCbor } from './cbor';
import { MalformedMessageError, MissingKeyIdError } from './errors';
import { CoseSign1, COSE_HEADER, COSE_ALG, SignedMessage } from './types';

/**
 * COSE_Sign1 Tag (RFC 8152)
 */
const COSE_SIGN1_TAG = 18;

/**
 * Parse buffer from a COSE_Sign1 element (bstr)
 */
function parseBuffer(value: unknown, field: string): Buffer {
  const buffer = asBuffer(value);
  if (!buffer) {
    throw new MalformedMessageError(`Invalid COSE_Sign1 ${field}: expected byte string, got ${typeof value}`);
  }
  return buffer;
}

/**
 * Parse COSE_Sign1 structure from CBOR
 */
function parseCoseSign1(data: unknown[]): CoseSign1 {
  if (data.length !== 4) {
    throw new MalformedMessageError('Invalid COSE_Sign1 structure: expected array of 4 elements');
  }

  const [protectedHeader, unprotectedHeader, payload, signature] = data;

  const unprotected = asMap(unprotectedHeader);
  if (!unprotected) {
    throw new MalformedMessageError('Invalid COSE_Sign1 unprotected header: expected map');
  }

  return {
    protectedHeader: parseBuffer(protectedHeader, 'protected header'),
    unprotectedHeader: new Map(
      Array.from(unprotected, ([label, value]): [number, unknown] => [Number(label), value]),
    ),
    payload: parseBuffer(payload, 'payload'),
    signature: parseBuffer(signature, 'signature'),
  };
}

/**
 * Decode the protected header map; a zero-length bstr is an empty map
 */
export function decodeProtectedHeader(protectedHeader: Buffer): Map<number, unknown> {
  if (protectedHeader.length === 0) {
    return new Map();
  }

  let decoded: unknown;
  try {
    decoded = cborDecoder.decode(protectedHeader);
  } catch (error) {
    throw new MalformedMessageError('Failed to decode protected header', error);
  }

  const map = asMap(decoded);
  if (!map) {
    throw new MalformedMessageError('Invalid protected header: expected map');
  }

  return new Map(Array.from(map, ([label, value]): [number, unknown] => [Number(label), value]));
}

function extractKeyId(header: Map<number, unknown>, where: string): Buffer | undefined {
  const kid = header.get(COSE_HEADER.KID);
  if (kid === undefined) {
    return undefined;
  }
  return parseBuffer(kid, `${where} key ID`);
}

function extractAlgorithm(header: Map<number, unknown>): number | undefined {
  const alg = header.get(COSE_HEADER.ALG);
  return typeof alg === 'number' ? alg : undefined;
}

/**
 * Main signed message parser
 *
 * @param data - CBOR encoded COSE_Sign1, tagged (18) or untagged
 */
export function parseSignedMessage(data: Buffer | Uint8Array): SignedMessage {
  let decoded: unknown;
  try {
    decoded = cborDecoder.decode(data);
  } catch (error) {
    throw new MalformedMessageError('Failed to decode CBOR', error);
  }

  let coseArray: unknown[];

  if (Array.isArray(decoded)) {
    coseArray = decoded;
  } else if (decoded instanceof Tag) {
    if (decoded.tag !== COSE_SIGN1_TAG || !Array.isArray(decoded.value)) {
      throw new MalformedMessageError(`Unsupported COSE message tag: ${decoded.tag}`);
    }
    coseArray = decoded.value;
  } else {
    throw new MalformedMessageError(`Invalid COSE_Sign1 format: ${typeof decoded}`);
  }

  const coseSign1 = parseCoseSign1(coseArray);
  const protectedMap = decodeProtectedHeader(coseSign1.protectedHeader);

  return {
    protectedKeyId: extractKeyId(protectedMap, 'protected'),
    unprotectedKeyId: extractKeyId(coseSign1.unprotectedHeader, 'unprotected'),
    algorithm: extractAlgorithm(protectedMap) ?? extractAlgorithm(coseSign1.unprotectedHeader),
    coseSign1,
  };
}

/**
 * Key ID used to look up the signer: protected header first
 */
export function effectiveKeyId(message: SignedMessage): Buffer {
  const kid = message.protectedKeyId ?? message.unprotectedKeyId;
  if (!kid) {
    throw new MissingKeyIdError('No key ID in protected or unprotected header');
  }
  return kid;
}

/**
 * Sig_structure for COSE_Sign1 (RFC 8152, Section 4.4), no external AAD
 */
export function buildSigStructure(protectedHeader: Buffer, payload: Buffer): Buffer {
  return encodeCbor(['Signature1', protectedHeader, Buffer.alloc(0), payload]);
}

/**
 * Get algorithm name from COSE algorithm value
 */
export function getAlgorithmName(alg: number | undefined): string {
  switch (alg) {
    case COSE_ALG.ES256:
      return 'ES256 (ECDSA w/ SHA-256)';
    case COSE_ALG.ES384:
      return 'ES384 (ECDSA w/ SHA-384)';
    case COSE_ALG.ES512:
      return 'ES512 (ECDSA w/ SHA-512)';
    case COSE_ALG.PS256:
      return 'PS256 (RSASSA-PSS w/ SHA-256)';
    case undefined:
      return 'Not specified';
    default:
      return `Unknown (${alg})`;
  }
}
