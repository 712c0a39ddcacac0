import { Tag } from 'cbor-x';
import { asMap, cborDecoder } from './cbor';
import { MalformedMessageError } from './errors';
import { createLogger } from './logger';
import {
  Claim,
  CLAIM,
  CLAIM_NAMES,
  ClaimValue,
  DATETIME_CLAIMS,
  DecodedClaims,
  HEALTH_CERTIFICATE_KEY,
} from './types';

const logger = createLogger('claims');

/**
 * Epoch seconds -> Date
 */
export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Turn a decoded CBOR value into plain data (maps -> objects, bytes -> base64)
 */
export function toClaimValue(value: unknown): ClaimValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(toClaimValue);
  }
  if (value instanceof Map) {
    const out: { [key: string]: ClaimValue } = {};
    for (const [key, item] of value) {
      out[String(key)] = toClaimValue(item);
    }
    return out;
  }
  if (value instanceof Tag) {
    return toClaimValue(value.value);
  }
  if (typeof value === 'object') {
    const out: { [key: string]: ClaimValue } = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toClaimValue(item);
    }
    return out;
  }
  return String(value);
}

function claimName(code: number): string {
  return CLAIM_NAMES.get(code) ?? `Claim ${code} (unknown)`;
}

function parseEpochClaim(code: number, value: unknown): Date {
  let seconds: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    seconds = value;
  } else if (typeof value === 'bigint' && Number.isSafeInteger(Number(value))) {
    seconds = Number(value);
  } else {
    throw new MalformedMessageError(`Invalid ${claimName(code)} claim: expected epoch seconds, got ${String(value)}`);
  }

  const date = fromEpochSeconds(seconds);
  if (!Number.isFinite(date.getTime())) {
    throw new MalformedMessageError(`Invalid ${claimName(code)} claim: ${seconds} is out of range`);
  }
  return date;
}

/**
 * Decode the CWT payload of a health certificate
 *
 * Works on unverified payloads too; verification is a separate step.
 */
export function decodeClaims(payload: Buffer | Uint8Array): DecodedClaims {
  let decoded: unknown;
  try {
    decoded = cborDecoder.decode(payload);
  } catch (error) {
    throw new MalformedMessageError('Failed to decode payload', error);
  }

  const map = asMap(decoded);
  if (!map) {
    throw new MalformedMessageError('Invalid payload: expected claims map');
  }

  const result: DecodedClaims = { claims: [] };

  for (const [key, value] of map) {
    const code = Number(key);

    if (code === CLAIM.HEALTH_CLAIMS) {
      const document = asMap(value)?.get(HEALTH_CERTIFICATE_KEY);
      if (document === undefined) {
        logger.warn('Health claims claim has no certificate document');
      } else {
        result.healthClaims = toClaimValue(document);
      }
      continue;
    }

    if (DATETIME_CLAIMS.has(code)) {
      const date = parseEpochClaim(code, value);
      if (code === CLAIM.ISSUED_AT) {
        result.issuedAt = date;
      } else {
        result.expiresAt = date;
      }
      result.claims.push({ code, name: claimName(code), value: date });
      continue;
    }

    if (!CLAIM_NAMES.has(code)) {
      logger.warn({ code }, 'Unknown claim');
    }

    const claim: Claim = { code, name: claimName(code), value: toClaimValue(value) };
    if (code === CLAIM.ISSUER && typeof claim.value === 'string') {
      result.issuer = claim.value;
    }
    result.claims.push(claim);
  }

  return result;
}

/**
 * A claim set is expired from its expires-at instant on
 */
export function isClaimSetExpired(claims: DecodedClaims, now: Date = new Date()): boolean | undefined {
  if (!claims.expiresAt) {
    return undefined;
  }
  return now.getTime() >= claims.expiresAt.getTime();
}

/**
 * Key-sorted, indented JSON with ISO-8601 timestamps
 */
export function renderJson(value: ClaimValue, indent = 4): string {
  return JSON.stringify(sortKeys(value), null, indent);
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function sortKeys(value: ClaimValue): JsonValue {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key]);
    }
    return out;
  }
  return value;
}
