// Transport
export { base45Decode, base45Encode } from './base45';
export { decodeTransport, stripPrefix } from './transport';

// Signed message
export {
  parseSignedMessage,
  decodeProtectedHeader,
  effectiveKeyId,
  buildSigStructure,
  getAlgorithmName,
} from './message';

// Trust store
export { createCertificateEntry, computeKeyId, isCertificateExpired } from './certificate';
export { loadBinaryTrustList, loadSignedJsonTrustList } from './trustList';
export { TrustStore } from './trustStore';
export type { CertificateList } from './trustStore';
export { downloadTrustLists, loadTrustListFile, createHttpFetcher } from './sources';
export type { Fetcher, FetchResponse } from './sources';

// Verification
export { extractPublicKeyMaterial, toVerificationKey, normalizeCurveName } from './keys';
export { verifyMessage, verifySignature, summarizeCertificate } from './verifier';

// Claims
export { decodeClaims, isClaimSetExpired, renderJson } from './claims';
export { processCode, processCodes } from './pipeline';
export type { CodeReport, ProcessOptions } from './pipeline';

// Config
export { loadConfig } from './config';
export type { DhcConfig } from './config';

// Errors
export * from './errors';

// Types
export type {
  CoseSign1,
  SignedMessage,
  CertificateEntry,
  CertificateSummary,
  PublicKeyInfo,
  PublicKeyMaterial,
  VerificationResult,
  Claim,
  ClaimValue,
  DecodedClaims,
} from './types';

// Constants
export {
  COSE_HEADER,
  COSE_ALG,
  CLAIM,
  CLAIM_NAMES,
  DEBUG_KEY_IDS,
} from './types';
