import { constants, verify } from 'crypto';
import { isCertificateExpired } from './certificate';
import { UnknownKeyIdError, VerificationError } from './errors';
import { describePublicKey, extractPublicKeyMaterial, toVerificationKey, VerificationKey } from './keys';
import { createLogger } from './logger';
import { buildSigStructure, effectiveKeyId } from './message';
import { TrustStore } from './trustStore';
import {
  CertificateEntry,
  CertificateSummary,
  DEBUG_KEY_IDS,
  SignedMessage,
  VerificationResult,
} from './types';

const logger = createLogger('verifier');

// PS256 uses a salt as long as the SHA-256 digest
const PSS_SALT_LENGTH = 32;

export interface VerifyOptions {
  now?: Date;
}

export function summarizeCertificate(entry: CertificateEntry): CertificateSummary {
  const { keyType, curve } = describePublicKey(entry.publicKey);
  return {
    keyId: entry.keyId.toString('hex'),
    serialNumber: entry.serialNumber.toString(),
    version: entry.version,
    issuer: entry.issuer,
    subject: entry.subject,
    notBefore: entry.notBefore,
    notAfter: entry.notAfter,
    keyType,
    curve,
    signatureAlgorithm: entry.signatureAlgorithm,
  };
}

/**
 * Check a raw COSE signature; a mismatch is `false`, not an error
 */
export function verifySignature(verificationKey: VerificationKey, data: Buffer, signature: Buffer): boolean {
  try {
    if (verificationKey.algorithm === 'ES256') {
      return verify('sha256', data, { key: verificationKey.key, dsaEncoding: 'ieee-p1363' }, signature);
    }
    return verify(
      'sha256',
      data,
      {
        key: verificationKey.key,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: PSS_SALT_LENGTH,
      },
      signature,
    );
  } catch (error) {
    logger.warn({ err: error, algorithm: verificationKey.algorithm }, 'Signature could not be checked');
    return false;
  }
}

/**
 * Resolve the signer of a message in the trust store and verify it
 *
 * @throws MissingKeyIdError, UnknownKeyIdError, UnsupportedCurveError, UnsupportedKeyTypeError
 */
export function verifyMessage(
  message: SignedMessage,
  trustStore: TrustStore,
  options: VerifyOptions = {},
): VerificationResult {
  const now = options.now ?? new Date();
  const keyId = effectiveKeyId(message);
  const keyIdHex = keyId.toString('hex');

  const entry = trustStore.get(keyId);
  if (!entry) {
    throw new UnknownKeyIdError(keyIdHex);
  }

  const certificate = summarizeCertificate(entry);
  const certificateExpired = isCertificateExpired(entry, now);

  let verificationKey: VerificationKey;
  try {
    verificationKey = toVerificationKey(extractPublicKeyMaterial(entry.publicKey));
  } catch (error) {
    if (error instanceof VerificationError) {
      error.certificate = certificate;
    }
    throw error;
  }

  const { protectedHeader, payload, signature } = message.coseSign1;
  const signatureValid = verifySignature(
    verificationKey,
    buildSigStructure(protectedHeader, payload),
    signature,
  );

  logger.debug({ keyId: keyIdHex, signatureValid, certificateExpired }, 'Verified health certificate');

  return {
    keyIdHex,
    keyIdBase64: keyId.toString('base64'),
    certificate,
    algorithm: verificationKey.algorithm,
    signatureValid,
    certificateExpired,
    debugKey: DEBUG_KEY_IDS.has(keyIdHex),
    valid: signatureValid && !certificateExpired,
  };
}
