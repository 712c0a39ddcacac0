import { CertificateEntry } from './types';

/**
 * Certificates of one trust list source, keyed by hex key ID
 */
export type CertificateList = Map<string, CertificateEntry>;

/**
 * Read-only key ID -> certificate mapping
 */
export class TrustStore {
  private readonly entries: ReadonlyMap<string, CertificateEntry>;

  private constructor(entries: Map<string, CertificateEntry>) {
    this.entries = entries;
  }

  /**
   * Union of several lists; a later list overrides an earlier one on the same key ID
   */
  static fromLists(lists: Iterable<CertificateList>): TrustStore {
    const merged = new Map<string, CertificateEntry>();
    for (const list of lists) {
      for (const [keyId, entry] of list) {
        merged.set(keyId, entry);
      }
    }
    return new TrustStore(merged);
  }

  static empty(): TrustStore {
    return new TrustStore(new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  get(keyId: Uint8Array): CertificateEntry | undefined {
    return this.entries.get(Buffer.from(keyId).toString('hex'));
  }

  has(keyId: Uint8Array): boolean {
    return this.get(keyId) !== undefined;
  }

  /**
   * All entries sorted by issuer, subject, then key ID
   */
  list(): CertificateEntry[] {
    return Array.from(this.entries.values()).sort(
      (a, b) =>
        compare(a.issuer, b.issuer) ||
        compare(a.subject, b.subject) ||
        compare(a.keyId.toString('hex'), b.keyId.toString('hex')),
    );
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
