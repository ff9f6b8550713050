export type StoreValueType = 'string' | 'set' | 'none' | 'other';

/**
 * The slice of a key-value service the index needs. Every operation is
 * independent per key; implementations map their failures onto
 * StoreConnectionError (fatal for the operation) and StoreOperationError
 * (confined to one key).
 */
export interface StoreClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  setAdd(key: string, ...members: string[]): Promise<number>;
  setRemove(key: string, ...members: string[]): Promise<number>;
  members(key: string): Promise<string[]>;
  typeOf(key: string): Promise<StoreValueType>;
  delete(...keys: string[]): Promise<number>;
  /** Every key starting with `prefix`, in no particular order. */
  scanPrefix(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}

/** In-process store used by the `memory` backend and by tests. */
export class MemoryStoreClient implements StoreClient {
  private strings = new Map<string, string>();
  private sets = new Map<string, Set<string>>();

  async get(key: string) {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string) {
    this.sets.delete(key);
    this.strings.set(key, value);
  }

  async setAdd(key: string, ...members: string[]) {
    this.strings.delete(key);
    const set = this.sets.get(key) ?? new Set<string>();
    const before = set.size;
    for (const member of members) set.add(member);
    this.sets.set(key, set);
    return set.size - before;
  }

  async setRemove(key: string, ...members: string[]) {
    const set = this.sets.get(key);
    if (!set) return 0;
    let removed = 0;
    for (const member of members) if (set.delete(member)) removed++;
    // Redis drops empty sets; so does this store.
    if (set.size === 0) this.sets.delete(key);
    return removed;
  }

  async members(key: string) {
    return Array.from(this.sets.get(key) ?? []);
  }

  async typeOf(key: string): Promise<StoreValueType> {
    if (this.strings.has(key)) return 'string';
    if (this.sets.has(key)) return 'set';
    return 'none';
  }

  async delete(...keys: string[]) {
    let removed = 0;
    for (const key of keys) {
      if (this.strings.delete(key) || this.sets.delete(key)) removed++;
    }
    return removed;
  }

  async scanPrefix(prefix: string) {
    return this.keys().filter(key => key.startsWith(prefix));
  }

  async close() {
    // nothing to release
  }

  /** All keys, sorted. Handy for asserting on store state. */
  keys(): string[] {
    return [...this.strings.keys(), ...this.sets.keys()].sort();
  }
}
