import { decodeClaims, isClaimSetExpired } from './claims';
import { VerificationError } from './errors';
import { createLogger } from './logger';
import { parseSignedMessage } from './message';
import { decodeTransport } from './transport';
import { TrustStore } from './trustStore';
import { DecodedClaims, SignedMessage, VerificationResult } from './types';
import { verifyMessage } from './verifier';

const logger = createLogger('pipeline');

export interface CodeReport {
  code: string;
  message: SignedMessage;
  /** Key ID from the headers, protected first; reported whatever the outcome */
  keyIdHex?: string;
  keyIdBase64?: string;
  claims: DecodedClaims;
  /** Undefined when the payload has no expires-at claim */
  claimsExpired?: boolean;
  /** Undefined when no trust store was given */
  verification?: VerificationResult;
  /** Why the certificate could not be verified */
  verificationError?: VerificationError;
}

export interface ProcessOptions {
  /** Skip verification when absent */
  trustStore?: TrustStore;
  now?: Date;
}

/**
 * Decode one health certificate code and verify it against the trust store
 *
 * Decode errors are thrown; verification errors are captured in the report so
 * that the claims stay available.
 */
export function processCode(code: string, options: ProcessOptions = {}): CodeReport {
  const now = options.now ?? new Date();
  const message = parseSignedMessage(decodeTransport(code));
  const claims = decodeClaims(message.coseSign1.payload);

  const keyId = message.protectedKeyId ?? message.unprotectedKeyId;

  const report: CodeReport = {
    code,
    message,
    keyIdHex: keyId?.toString('hex'),
    keyIdBase64: keyId?.toString('base64'),
    claims,
    claimsExpired: isClaimSetExpired(claims, now),
  };

  if (!options.trustStore) {
    return report;
  }

  try {
    report.verification = verifyMessage(message, options.trustStore, { now });
  } catch (error) {
    if (!(error instanceof VerificationError)) {
      throw error;
    }
    logger.warn({ code: error.code }, error.message);
    report.verificationError = error;
  }

  return report;
}

/**
 * Process a batch; one failing verification does not stop the others
 */
export function processCodes(codes: string[], options: ProcessOptions = {}): CodeReport[] {
  return codes.map(code => processCode(code, options));
}
