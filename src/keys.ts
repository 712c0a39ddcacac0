import { RSAPublicKey } from '@peculiar/asn1-rsa';
import { AsnConvert } from '@peculiar/asn1-schema';
import { SubjectPublicKeyInfo } from '@peculiar/asn1-x509';
import { createPublicKey, JsonWebKey, KeyObject } from 'crypto';
import { toArrayBuffer } from './certificate';
import { UnsupportedCurveError, UnsupportedKeyTypeError } from './errors';
import { PublicKeyInfo, PublicKeyMaterial, VerificationAlgorithm } from './types';

interface CurveParams {
  /** JWK "crv" value */
  jwkCurve: 'P-256' | 'P-384' | 'P-521';
  /** Coordinate width in bytes */
  size: number;
}

const P256: CurveParams = { jwkCurve: 'P-256', size: 32 };
const P384: CurveParams = { jwkCurve: 'P-384', size: 48 };
const P521: CurveParams = { jwkCurve: 'P-521', size: 66 };

// https://tools.ietf.org/search/rfc4492#appendix-A
const CURVES: ReadonlyMap<string, CurveParams> = new Map([
  ['secp256r1', P256],
  ['prime256v1', P256],
  ['p256', P256],
  ['secp384r1', P384],
  ['p384', P384],
  ['secp521r1', P521],
  ['p521', P521],
]);

const CURVE_NAME_IGNORE = /[-_ ]/g;

export function normalizeCurveName(name: string): string {
  return name.replace(CURVE_NAME_IGNORE, '').toLowerCase();
}

export function lookupCurve(name: string): CurveParams | undefined {
  return CURVES.get(normalizeCurveName(name));
}

/**
 * Load a SubjectPublicKeyInfo into a Node key object
 */
export function loadPublicKey(info: PublicKeyInfo): KeyObject {
  try {
    return createPublicKey({ key: info.spki, format: 'der', type: 'spki' });
  } catch (error) {
    throw new UnsupportedKeyTypeError('Unsupported or invalid public key', error);
  }
}

function jwkBytes(value: string | undefined, field: string): Buffer {
  if (value === undefined) {
    throw new UnsupportedKeyTypeError(`Public key has no "${field}" component`);
  }
  return Buffer.from(value, 'base64url');
}

function exportJwk(key: KeyObject): JsonWebKey {
  try {
    return key.export({ format: 'jwk' });
  } catch (error) {
    throw new UnsupportedKeyTypeError(`Cannot export ${key.asymmetricKeyType ?? 'unknown'} public key`, error);
  }
}

/**
 * Modulus and exponent straight from the SPKI; works for both the
 * rsaEncryption and the RSASSA-PSS key algorithm identifiers
 */
function readRsaPublicKey(info: PublicKeyInfo): { modulus: Buffer; exponent: Buffer } {
  try {
    const spki = AsnConvert.parse(toArrayBuffer(info.spki), SubjectPublicKeyInfo);
    const key = AsnConvert.parse(spki.subjectPublicKey, RSAPublicKey);
    return {
      modulus: Buffer.from(key.modulus),
      exponent: Buffer.from(key.publicExponent),
    };
  } catch (error) {
    throw new UnsupportedKeyTypeError('Invalid RSA public key', error);
  }
}

function leftPad(bytes: Buffer, size: number): Buffer {
  if (bytes.length >= size) {
    return bytes;
  }
  return Buffer.concat([Buffer.alloc(size - bytes.length), bytes]);
}

function stripLeadingZeros(bytes: Buffer): Buffer {
  let start = 0;
  while (start < bytes.length - 1 && bytes[start] === 0) {
    start++;
  }
  return bytes.subarray(start);
}

/**
 * Extract verification key material from a certificate public key
 */
export function extractPublicKeyMaterial(info: PublicKeyInfo): PublicKeyMaterial {
  const key = loadPublicKey(info);

  switch (key.asymmetricKeyType) {
    case 'ec': {
      const curveName = key.asymmetricKeyDetails?.namedCurve ?? 'unknown';
      const curve = lookupCurve(curveName);
      if (!curve) {
        throw new UnsupportedCurveError(`Unsupported curve: ${curveName}`);
      }

      const jwk = exportJwk(key);
      return {
        kind: 'ec',
        curve: normalizeCurveName(curveName),
        x: leftPad(jwkBytes(jwk.x, 'x'), curve.size),
        y: leftPad(jwkBytes(jwk.y, 'y'), curve.size),
      };
    }
    case 'rsa':
    case 'rsa-pss': {
      const { modulus, exponent } = readRsaPublicKey(info);
      return {
        kind: 'rsa',
        modulus: stripLeadingZeros(modulus),
        exponent: stripLeadingZeros(exponent),
      };
    }
    default:
      throw new UnsupportedKeyTypeError(`Unsupported public key type: ${key.asymmetricKeyType ?? 'unknown'}`);
  }
}

export interface VerificationKey {
  algorithm: VerificationAlgorithm;
  key: KeyObject;
}

/**
 * Bind key material to its COSE algorithm and build a verification key
 */
export function toVerificationKey(material: PublicKeyMaterial): VerificationKey {
  switch (material.kind) {
    case 'ec': {
      const curve = lookupCurve(material.curve);
      if (!curve) {
        throw new UnsupportedCurveError(`Unsupported curve: ${material.curve}`);
      }
      return {
        algorithm: 'ES256',
        key: createPublicKey({
          key: {
            kty: 'EC',
            crv: curve.jwkCurve,
            x: material.x.toString('base64url'),
            y: material.y.toString('base64url'),
          },
          format: 'jwk',
        }),
      };
    }
    case 'rsa':
      return {
        algorithm: 'PS256',
        key: createPublicKey({
          key: {
            kty: 'RSA',
            n: material.modulus.toString('base64url'),
            e: material.exponent.toString('base64url'),
          },
          format: 'jwk',
        }),
      };
    default: {
      const unreachable: never = material;
      throw new UnsupportedKeyTypeError(`Unsupported key material: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Key type and curve for diagnostics; never throws
 */
export function describePublicKey(info: PublicKeyInfo): { keyType: string; curve?: string } {
  let key: KeyObject;
  try {
    key = loadPublicKey(info);
  } catch (error) {
    return { keyType: error instanceof Error ? `unsupported (${error.message})` : 'unsupported' };
  }
  return {
    keyType: key.asymmetricKeyType ?? 'unknown',
    curve: key.asymmetricKeyDetails?.namedCurve,
  };
}
