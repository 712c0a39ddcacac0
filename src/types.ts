/**
 * Digital Health Certificate (DHC) Type Definitions
 * Based on RFC 8152 (COSE) and the EU DCC/HCERT transport profile
 */

// COSE_Sign1 structure as found on the wire
export interface CoseSign1 {
  protectedHeader: Buffer;
  unprotectedHeader: Map<number, unknown>;
  payload: Buffer;
  signature: Buffer;
}

// COSE Header Labels
export const COSE_HEADER = {
  ALG: 1,        // Algorithm
  KID: 4,        // Key ID
} as const;

// COSE Algorithm Values
export const COSE_ALG = {
  ES256: -7,     // ECDSA w/ SHA-256
  ES384: -35,    // ECDSA w/ SHA-384
  ES512: -36,    // ECDSA w/ SHA-512
  PS256: -37,    // RSASSA-PSS w/ SHA-256
} as const;

export type VerificationAlgorithm = 'ES256' | 'PS256';

// Parsed signed message (single signer)
export interface SignedMessage {
  /** Key ID from the protected header */
  protectedKeyId?: Buffer;

  /** Key ID from the unprotected header */
  unprotectedKeyId?: Buffer;

  /** Algorithm from the protected header, if any */
  algorithm?: number;

  coseSign1: CoseSign1;
}

// Public key as stored in a trust list entry
export interface PublicKeyInfo {
  /** DER-encoded SubjectPublicKeyInfo */
  spki: Buffer;
}

// Verification key material, reconstructed from PublicKeyInfo
export type PublicKeyMaterial =
  | {
      kind: 'ec';
      /** Normalized curve name, e.g. "secp256r1" */
      curve: string;
      /** Big-endian, padded to the curve's coordinate size */
      x: Buffer;
      y: Buffer;
    }
  | {
      kind: 'rsa';
      /** Minimal big-endian encodings */
      modulus: Buffer;
      exponent: Buffer;
    };

// Trust list entry
export interface CertificateEntry {
  /** First 8 bytes of the SHA-256 fingerprint of `der` */
  keyId: Buffer;

  /** RFC 4514 style distinguished names */
  issuer: string;
  subject: string;

  serialNumber: bigint;
  /** X.509 version as printed (1, 2 or 3) */
  version?: number;
  notBefore?: Date;
  notAfter?: Date;

  publicKey: PublicKeyInfo;

  /** e.g. "ECDSA with SHA-256" */
  signatureAlgorithm: string;

  /** DER-encoded X.509 certificate */
  der: Buffer;
}

// Diagnostic view of a certificate, safe to print
export interface CertificateSummary {
  keyId: string;
  serialNumber: string;
  version?: number;
  issuer: string;
  subject: string;
  notBefore?: Date;
  notAfter?: Date;
  keyType: string;
  curve?: string;
  signatureAlgorithm: string;
}

export interface VerificationResult {
  keyIdHex: string;
  keyIdBase64: string;
  certificate: CertificateSummary;
  algorithm: VerificationAlgorithm;
  signatureValid: boolean;
  certificateExpired: boolean;
  /** Signed by a well-known test key */
  debugKey: boolean;
  /** signatureValid && !certificateExpired */
  valid: boolean;
}

// Claim values after normalization (maps become objects, bytes become base64)
export type ClaimValue =
  | string
  | number
  | boolean
  | null
  | Date
  | ClaimValue[]
  | { [key: string]: ClaimValue };

export interface Claim {
  code: number;
  name: string;
  value: ClaimValue;
}

export interface DecodedClaims {
  /** In payload order; the health claims document is not flattened here */
  claims: Claim[];
  issuer?: string;
  issuedAt?: Date;
  expiresAt?: Date;
  /** Sub-document 1 of the health claims claim (-260) */
  healthClaims?: ClaimValue;
}

// CWT claim keys
export const CLAIM = {
  ISSUER: 1,
  EXPIRES_AT: 4,
  ISSUED_AT: 6,
  HEALTH_CLAIMS: -260,
} as const;

export const CLAIM_NAMES: ReadonlyMap<number, string> = new Map([
  [CLAIM.ISSUER, 'Issuer'],
  [CLAIM.ISSUED_AT, 'Issued At'],
  [CLAIM.EXPIRES_AT, 'Expires At'],
  [CLAIM.HEALTH_CLAIMS, 'Health Claims'],
]);

export const DATETIME_CLAIMS: ReadonlySet<number> = new Set([CLAIM.ISSUED_AT, CLAIM.EXPIRES_AT]);

// Key of the current schema version inside the health claims claim
export const HEALTH_CERTIFICATE_KEY = 1;

// QR text prefix for health certificates
export const HC1_PREFIX = 'HC1';

// Key IDs of publicly known test signers (hex)
export const DEBUG_KEY_IDS: ReadonlySet<string> = new Set([
  'd919375fc1e7b6b2',
]);

// Length of a key ID in bytes
export const KEY_ID_LENGTH = 8;
