import axios from 'axios';
import { createPublicKey, KeyObject } from 'crypto';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { DhcConfig } from './config';
import { MalformedTrustListError, TrustListFetchError, UnknownTrustListSourceError } from './errors';
import { createLogger } from './logger';
import { loadBinaryTrustList, loadSignedJsonTrustList } from './trustList';
import { CertificateList, TrustStore } from './trustStore';

const logger = createLogger('sources');

export interface FetchResponse {
  status: number;
  body: Buffer;
}

/**
 * Retrieves a URL; one attempt, no retries
 */
export type Fetcher = (url: string) => Promise<FetchResponse>;

export function createHttpFetcher(timeoutMs: number): Fetcher {
  const client = axios.create({
    timeout: timeoutMs,
    responseType: 'arraybuffer',
    validateStatus: () => true,
    headers: { 'User-Agent': 'dhc-verify/0.1.0' },
  });

  return async (url: string) => {
    try {
      const response = await client.get<ArrayBuffer>(url);
      return {
        status: response.status,
        body: Buffer.from(response.data),
      };
    } catch (error) {
      throw new TrustListFetchError(`Failed to fetch ${url}`, error);
    }
  };
}

// Austrian master data envelope around the binary trust list
const MasterDataSchema = z.object({
  trustList: z.object({
    trustListContent: z.string(),
  }),
});

async function fetchOk(fetcher: Fetcher, url: string): Promise<Buffer> {
  const response = await fetcher(url);
  if (response.status < 200 || response.status >= 300) {
    throw new TrustListFetchError(`Failed to fetch ${url}: HTTP ${response.status}`);
  }
  return response.body;
}

async function loadSourceAT(fetcher: Fetcher, config: DhcConfig): Promise<CertificateList> {
  const body = await fetchOk(fetcher, config.sources.AT.certsUrl);

  let json: unknown;
  try {
    json = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new MalformedTrustListError('Invalid AT master data: not JSON', error);
  }

  const masterData = MasterDataSchema.safeParse(json);
  if (!masterData.success) {
    throw new MalformedTrustListError(`Invalid AT master data: ${masterData.error.message}`, masterData.error);
  }

  return loadBinaryTrustList(Buffer.from(masterData.data.trustList.trustListContent, 'base64'));
}

async function fetchPublicKeyDE(fetcher: Fetcher, url: string): Promise<KeyObject | undefined> {
  const response = await fetcher(url);
  if (response.status === 404) {
    logger.warn({ url }, 'Public key for German trust list not found (404)');
    return undefined;
  }
  if (response.status < 200 || response.status >= 300) {
    throw new TrustListFetchError(`Failed to fetch ${url}: HTTP ${response.status}`);
  }

  let key: KeyObject;
  try {
    key = createPublicKey(response.body.toString('utf8'));
  } catch (error) {
    throw new MalformedTrustListError(`Invalid public key at ${url}`, error);
  }
  if (key.asymmetricKeyType !== 'ec') {
    logger.warn({ url, keyType: key.asymmetricKeyType }, 'German trust list key is not an elliptic curve key');
    return undefined;
  }
  return key;
}

async function loadSourceDE(fetcher: Fetcher, config: DhcConfig): Promise<CertificateList> {
  const body = await fetchOk(fetcher, config.sources.DE.certsUrl);
  const publicKey = await fetchPublicKeyDE(fetcher, config.sources.DE.pubkeyUrl);
  return loadSignedJsonTrustList(body, publicKey);
}

const SOURCES: Record<string, (fetcher: Fetcher, config: DhcConfig) => Promise<CertificateList>> = {
  AT: loadSourceAT,
  DE: loadSourceDE,
};

export function isKnownSource(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(SOURCES, name);
}

/**
 * Download trust lists in the given order and merge them; later sources win
 */
export async function downloadTrustLists(
  sources: string[],
  config: DhcConfig,
  fetcher: Fetcher = createHttpFetcher(config.fetchTimeoutMs),
): Promise<TrustStore> {
  for (const source of sources) {
    if (!isKnownSource(source)) {
      throw new UnknownTrustListSourceError(`Unknown trust list source: ${source}`);
    }
  }

  const lists: CertificateList[] = [];
  for (const source of sources) {
    const list = await SOURCES[source](fetcher, config);
    logger.info({ source, count: list.size }, 'Loaded trust list');
    lists.push(list);
  }

  return TrustStore.fromLists(lists);
}

/**
 * Load a local binary trust list file
 */
export function loadTrustListFile(path: string): TrustStore {
  return TrustStore.fromLists([loadBinaryTrustList(readFileSync(path))]);
}
