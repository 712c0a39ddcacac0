/**
 * Test fixtures: self-signed document signer certificates, COSE_Sign1
 * messages and trust lists, all generated in process.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as x509 from '@peculiar/x509';
import { Tag } from 'cbor-x';
import { constants, createPrivateKey, KeyObject, sign } from 'crypto';
import { deflateSync } from 'zlib';
import { base45Encode } from '../base45';
import { encodeCbor } from '../cbor';
import { computeKeyId } from '../certificate';
import { buildSigStructure } from '../message';
import { COSE_ALG, COSE_HEADER } from '../types';

x509.cryptoProvider.set(crypto);

export const NOT_BEFORE = new Date('2021-01-01T00:00:00Z');
export const NOT_AFTER = new Date('2031-01-01T00:00:00Z');

// 2021-06-01T00:00:00Z and 2022-06-01T00:00:00Z
export const ISSUED_AT = 1622505600;
export const EXPIRES_AT = 1654041600;

export interface TestSigner {
  kind: 'ec' | 'rsa';
  der: Buffer;
  keyId: Buffer;
  privateKey: KeyObject;
}

export interface SignerOptions {
  name?: string;
  notBefore?: Date;
  notAfter?: Date;
}

async function toSigner(kind: 'ec' | 'rsa', cert: x509.X509Certificate, keys: CryptoKeyPair): Promise<TestSigner> {
  const der = Buffer.from(cert.rawData);
  const pkcs8 = await crypto.subtle.exportKey('pkcs8', keys.privateKey);
  return {
    kind,
    der,
    keyId: computeKeyId(der),
    privateKey: createPrivateKey({ key: Buffer.from(pkcs8), format: 'der', type: 'pkcs8' }),
  };
}

export async function createEcSigner(options: SignerOptions = {}): Promise<TestSigner> {
  const keys = await crypto.subtle.generateKey({ name: 'ECDSA', namedCurve: 'P-256' }, true, ['sign', 'verify']);
  const cert = await x509.X509CertificateGenerator.createSelfSigned({
    serialNumber: '0a01',
    name: options.name ?? 'CN=Test DSC EC, C=AT',
    notBefore: options.notBefore ?? NOT_BEFORE,
    notAfter: options.notAfter ?? NOT_AFTER,
    signingAlgorithm: { name: 'ECDSA', hash: 'SHA-256' },
    keys,
  });
  return toSigner('ec', cert, keys);
}

export async function createRsaSigner(options: SignerOptions = {}): Promise<TestSigner> {
  const keys = await crypto.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: 2048,
      publicExponent: new Uint8Array([1, 0, 1]),
      hash: 'SHA-256',
    },
    true,
    ['sign', 'verify'],
  );
  const cert = await x509.X509CertificateGenerator.createSelfSigned({
    serialNumber: '0b02',
    name: options.name ?? 'CN=Test DSC RSA, C=DE',
    notBefore: options.notBefore ?? NOT_BEFORE,
    notAfter: options.notAfter ?? NOT_AFTER,
    signingAlgorithm: { name: 'RSASSA-PKCS1-v1_5' },
    keys,
  });
  return toSigner('rsa', cert, keys);
}

/**
 * Raw COSE signature: r || s for ES256, RSASSA-PSS for PS256
 */
export function signRaw(signer: TestSigner, data: Buffer): Buffer {
  if (signer.kind === 'ec') {
    return sign('sha256', data, { key: signer.privateKey, dsaEncoding: 'ieee-p1363' });
  }
  return sign('sha256', data, {
    key: signer.privateKey,
    padding: constants.RSA_PKCS1_PSS_PADDING,
    saltLength: 32,
  });
}

export interface CoseOptions {
  kidLocation?: 'protected' | 'unprotected' | 'none';
  tagged?: boolean;
  /** Key ID to put in the header instead of the signer's */
  keyId?: Buffer;
}

export function signCose(signer: TestSigner, payload: Buffer, options: CoseOptions = {}): Buffer {
  const location = options.kidLocation ?? 'protected';
  const keyId = options.keyId ?? signer.keyId;

  const protectedMap = new Map<number, unknown>([
    [COSE_HEADER.ALG, signer.kind === 'ec' ? COSE_ALG.ES256 : COSE_ALG.PS256],
  ]);
  const unprotectedMap = new Map<number, unknown>();
  if (location === 'protected') {
    protectedMap.set(COSE_HEADER.KID, keyId);
  } else if (location === 'unprotected') {
    unprotectedMap.set(COSE_HEADER.KID, keyId);
  }

  const protectedHeader = encodeCbor(protectedMap);
  const signature = signRaw(signer, buildSigStructure(protectedHeader, payload));
  const array = [protectedHeader, unprotectedMap, payload, signature];

  return encodeCbor(options.tagged === false ? array : new Tag(array, 18));
}

export function toHC1(cose: Buffer): string {
  return `HC1:${base45Encode(deflateSync(cose))}`;
}

export function loadHealthClaimsFixture(): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(path.join(__dirname, 'fixtures', 'health-claims.json'), 'utf-8'));
}

export function buildPayload(
  healthClaims: unknown = loadHealthClaimsFixture(),
  extra: [number, unknown][] = [],
): Buffer {
  return encodeCbor(
    new Map<number, unknown>([
      [1, 'AT'],
      [6, ISSUED_AT],
      [4, EXPIRES_AT],
      [-260, new Map([[1, healthClaims]])],
      ...extra,
    ]),
  );
}

export function buildBinaryTrustList(entries: { keyId: Buffer; der: Buffer }[]): Buffer {
  return encodeCbor(
    new Map([['c', entries.map(entry => new Map<string, Buffer>([['i', entry.keyId], ['c', entry.der]]))]]),
  );
}

export function flipByte(bytes: Buffer, index: number): Buffer {
  const copy = Buffer.from(bytes);
  copy[index] ^= 0x01;
  return copy;
}

/**
 * Fixed HC1 code signed with the key of fixtures/fixture-dsc.der, produced
 * outside this code base
 */
export function loadFixtureCode(): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', 'fixture-code.txt'), 'utf-8').trim();
}

export function loadFixtureCertificate(): Buffer {
  return fs.readFileSync(path.join(__dirname, 'fixtures', 'fixture-dsc.der'));
}
