import type { CertificateSummary } from './types';

export type DhcErrorCode =
  | 'InvalidEncoding'
  | 'DecompressionError'
  | 'MalformedMessage'
  | 'MalformedTrustList'
  | 'KeyIdMismatch'
  | 'SignatureInvalid'
  | 'UnknownTrustListSource'
  | 'TrustListFetchError'
  | 'MissingKeyId'
  | 'UnknownKeyId'
  | 'UnsupportedCurve'
  | 'UnsupportedKeyType';

/**
 * Base class for every decode, trust list and verification failure
 */
export abstract class DhcError extends Error {
  abstract readonly code: DhcErrorCode;

  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidEncodingError extends DhcError {
  readonly code = 'InvalidEncoding';
}

export class DecompressionError extends DhcError {
  readonly code = 'DecompressionError';
}

export class MalformedMessageError extends DhcError {
  readonly code = 'MalformedMessage';
}

export class MalformedTrustListError extends DhcError {
  readonly code = 'MalformedTrustList';
}

/**
 * A trust list entry whose declared key ID is not its certificate fingerprint.
 * The whole list is rejected.
 */
export class KeyIdMismatchError extends DhcError {
  readonly code = 'KeyIdMismatch';

  constructor(public readonly declared: string, public readonly actual: string) {
    super(`Key ID mismatch: ${declared} != ${actual}`);
  }
}

/**
 * The outer signature of a signed trust list does not verify.
 */
export class SignatureInvalidError extends DhcError {
  readonly code = 'SignatureInvalid';
}

export class UnknownTrustListSourceError extends DhcError {
  readonly code = 'UnknownTrustListSource';
}

export class TrustListFetchError extends DhcError {
  readonly code = 'TrustListFetchError';
}

/**
 * Failures that stop verification of one certificate. Claim decoding of the
 * same input and processing of other inputs continue.
 */
export abstract class VerificationError extends DhcError {
  /** Set once the signing certificate is known */
  certificate?: CertificateSummary;
}

export class MissingKeyIdError extends VerificationError {
  readonly code = 'MissingKeyId';
}

export class UnknownKeyIdError extends VerificationError {
  readonly code = 'UnknownKeyId';

  constructor(public readonly keyId: string) {
    super(`Key ID not found in trust list: ${keyId}`);
  }
}

export class UnsupportedCurveError extends VerificationError {
  readonly code = 'UnsupportedCurve';
}

export class UnsupportedKeyTypeError extends VerificationError {
  readonly code = 'UnsupportedKeyType';
}
