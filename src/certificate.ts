import { createHash } from 'crypto';
import { AsnConvert } from '@peculiar/asn1-schema';
import { Certificate } from '@peculiar/asn1-x509';
import * as x509 from '@peculiar/x509';
import { KeyIdMismatchError, MalformedTrustListError } from './errors';
import { CertificateEntry, KEY_ID_LENGTH } from './types';

/**
 * Copy bytes into a standalone ArrayBuffer (what WebCrypto-style APIs take)
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
}

/**
 * Key ID of a certificate: first 8 bytes of its SHA-256 fingerprint
 */
export function computeKeyId(der: Uint8Array): Buffer {
  return createHash('sha256').update(der).digest().subarray(0, KEY_ID_LENGTH);
}

function formatSignatureAlgorithm(cert: x509.X509Certificate): string {
  const { name, hash } = cert.signatureAlgorithm;
  return hash ? `${name} with ${hash.name}` : name;
}

// TBSCertificate.version is zero-based (v1 = 0)
function readVersion(der: ArrayBuffer): number {
  return AsnConvert.parse(der, Certificate).tbsCertificate.version + 1;
}

/**
 * Parse a DER certificate into a trust list entry
 *
 * Rejects the certificate when `keyId` is not its fingerprint prefix.
 */
export function createCertificateEntry(keyId: Uint8Array, der: Uint8Array): CertificateEntry {
  const declared = Buffer.from(keyId);
  const actual = computeKeyId(der);

  if (!declared.equals(actual)) {
    throw new KeyIdMismatchError(declared.toString('hex'), actual.toString('hex'));
  }

  const raw = toArrayBuffer(der);
  let cert: x509.X509Certificate;
  let version: number;
  try {
    cert = new x509.X509Certificate(raw);
    version = readVersion(raw);
  } catch (error) {
    throw new MalformedTrustListError(`Invalid DER certificate for key ID ${declared.toString('hex')}`, error);
  }

  return {
    keyId: declared,
    issuer: cert.issuer,
    subject: cert.subject,
    serialNumber: BigInt(`0x${cert.serialNumber || '0'}`),
    version,
    notBefore: cert.notBefore,
    notAfter: cert.notAfter,
    publicKey: {
      spki: Buffer.from(cert.publicKey.rawData),
    },
    signatureAlgorithm: formatSignatureAlgorithm(cert),
    der: Buffer.from(der),
  };
}

/**
 * Validity window check; a missing bound never expires the certificate
 */
export function isCertificateExpired(entry: CertificateEntry, now: Date = new Date()): boolean {
  const time = now.getTime();
  const beforeStart = entry.notBefore !== undefined && time < entry.notBefore.getTime();
  const afterEnd = entry.notAfter !== undefined && time > entry.notAfter.getTime();
  return beforeStart || afterEnd;
}
