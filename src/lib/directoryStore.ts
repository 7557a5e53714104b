/**
 * Case-insensitive DN to entry mapping holding the emulated tree
 */
import { DistinguishedName } from './dn';
import { Entry, type AttributeMap } from './entry';
import { AlreadyExistsError } from './errors';
import { toBuffer, toValueList, type ValueInput } from './utils';

export type SeedEntry = Record<string, ValueInput>;
export type SeedDirectory = Record<string, SeedEntry>;

export interface StoredEntry {
  /** DN as spelled when the entry was stored */
  dn: string;
  parsed: DistinguishedName;
  entry: Entry;
}

/**
 * Store key: lower-cased components, so that DNs differing only in case
 * (or in spacing around separators) share a key
 * @throws InvalidDnSyntaxError for a malformed DN
 */
export const normalizeDn = (dn: string): string =>
  DistinguishedName.parse(dn).components().join(',');

export class DirectoryStore {
  private entries = new Map<string, StoredEntry>();

  /**
   * Build a store from seed data. Values are copied, so later changes never
   * reach the caller's objects. String values are stored as UTF-8 bytes.
   * @throws InvalidDnSyntaxError for a malformed DN
   * @throws AlreadyExistsError for two DNs differing only in case
   */
  static fromSeed(seed: SeedDirectory = {}): DirectoryStore {
    const store = new DirectoryStore();
    for (const [dn, attributes] of Object.entries(seed)) {
      if (store.contains(dn)) throw new AlreadyExistsError(dn);
      const map: AttributeMap = {};
      for (const [name, values] of Object.entries(attributes)) {
        map[name] = toValueList(values).map(toBuffer);
      }
      store.put(dn, new Entry(map));
    }
    return store;
  }

  get size(): number {
    return this.entries.size;
  }

  contains(dn: string): boolean {
    return this.entries.has(normalizeDn(dn));
  }

  get(dn: string): StoredEntry | undefined {
    return this.entries.get(normalizeDn(dn));
  }

  /**
   * Store an entry, replacing any entry with the same normalized DN.
   * Callers check {@link contains} first when replacing is not wanted.
   */
  put(dn: string, entry: Entry): void {
    const parsed = DistinguishedName.parse(dn);
    this.entries.set(parsed.components().join(','), { dn, parsed, entry });
  }

  remove(dn: string): boolean {
    return this.entries.delete(normalizeDn(dn));
  }

  *keys(): IterableIterator<string> {
    for (const stored of this.entries.values()) yield stored.dn;
  }

  values(): IterableIterator<StoredEntry> {
    return this.entries.values();
  }

  /** Deep copy of the whole tree, keyed by DN as spelled */
  snapshot(): Record<string, AttributeMap> {
    const result: Record<string, AttributeMap> = {};
    for (const stored of this.entries.values()) {
      result[stored.dn] = stored.entry.toObject();
    }
    return result;
  }
}
