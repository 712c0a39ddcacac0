import { KeyObject, verify } from 'crypto';
import { z } from 'zod';
import { asBuffer, asMap, cborDecoder } from './cbor';
import { createCertificateEntry } from './certificate';
import { MalformedTrustListError, SignatureInvalidError } from './errors';
import { createLogger } from './logger';
import { CertificateList } from './trustStore';

const logger = createLogger('trust-list');

// Only document signer certificates sign health certificates
const DSC_CERTIFICATE_TYPE = 'DSC';

const SignedJsonEntrySchema = z.object({
  kid: z.string(),
  country: z.string(),
  certificateType: z.string(),
  rawData: z.string(),
});

const SignedJsonBodySchema = z.object({
  certificates: z.array(SignedJsonEntrySchema),
});

function addEntry(certs: CertificateList, keyId: Buffer, der: Buffer): void {
  const entry = createCertificateEntry(keyId, der);
  certs.set(entry.keyId.toString('hex'), entry);
}

/**
 * Load a binary (CBOR) trust list: `{ c: [{ i: kid, c: der }] }`
 *
 * Any entry whose key ID does not match its certificate rejects the whole list.
 */
export function loadBinaryTrustList(data: Buffer | Uint8Array): CertificateList {
  let decoded: unknown;
  try {
    decoded = cborDecoder.decode(data);
  } catch (error) {
    throw new MalformedTrustListError('Failed to decode CBOR trust list', error);
  }

  const items = asMap(decoded)?.get('c');
  if (!Array.isArray(items)) {
    throw new MalformedTrustListError('Invalid trust list: expected map with certificate array "c"');
  }

  const certs: CertificateList = new Map();

  items.forEach((item: unknown, index: number) => {
    const map = asMap(item);
    const keyId = asBuffer(map?.get('i'));
    const der = asBuffer(map?.get('c'));
    if (!keyId || !der) {
      throw new MalformedTrustListError(`Invalid trust list entry at index ${index}`);
    }
    addEntry(certs, keyId, der);
  });

  logger.debug({ count: certs.size }, 'Loaded binary trust list');
  return certs;
}

/**
 * Load a signed JSON trust list: base64 signature, newline, JSON body
 *
 * @param publicKey - EC key the body signature is checked with; skipped when absent
 */
export function loadSignedJsonTrustList(data: Buffer | Uint8Array, publicKey?: KeyObject): CertificateList {
  const raw = Buffer.from(data);
  const newline = raw.indexOf(0x0a);
  if (newline < 0) {
    throw new MalformedTrustListError('Invalid signed trust list: missing signature line');
  }

  const signature = Buffer.from(raw.subarray(0, newline).toString('ascii').trim(), 'base64');
  const bodyBytes = raw.subarray(newline + 1);

  if (publicKey) {
    let valid: boolean;
    try {
      valid = verify('sha256', bodyBytes, { key: publicKey, dsaEncoding: 'ieee-p1363' }, signature);
    } catch (error) {
      throw new SignatureInvalidError('Signed trust list signature could not be checked', error);
    }
    if (!valid) {
      throw new SignatureInvalidError(`Invalid signature of signed trust list: ${signature.toString('hex')}`);
    }
  } else {
    logger.warn('Signed trust list loaded without signature verification');
  }

  let json: unknown;
  try {
    json = JSON.parse(bodyBytes.toString('utf8'));
  } catch (error) {
    throw new MalformedTrustListError('Invalid signed trust list: body is not JSON', error);
  }

  const body = SignedJsonBodySchema.safeParse(json);
  if (!body.success) {
    throw new MalformedTrustListError(`Invalid signed trust list: ${body.error.message}`, body.error);
  }

  const certs: CertificateList = new Map();

  for (const cert of body.data.certificates) {
    const keyId = Buffer.from(cert.kid, 'base64');
    if (cert.certificateType !== DSC_CERTIFICATE_TYPE) {
      logger.warn(
        { certificateType: cert.certificateType, country: cert.country, kid: keyId.toString('hex') },
        'Skipping signed trust list entry with unknown certificateType',
      );
      continue;
    }
    addEntry(certs, keyId, Buffer.from(cert.rawData, 'base64'));
  }

  logger.debug({ count: certs.size }, 'Loaded signed JSON trust list');
  return certs;
}
