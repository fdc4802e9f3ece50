/**
 * Key-value storage behind the cache gate. No schema is imposed on the bytes.
 * `put` must replace a key atomically: a concurrent `get` sees the old or the new
 * entry, never a torn one.
 */
export interface CacheStore {
  get(key: string): Promise<Buffer | null>;
  put(key: string, data: Buffer): Promise<void>;
}

export const CACHE_STORE = Symbol('CACHE_STORE');

/** Process-local store for tests and throwaway runs. */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, Buffer>();

  async get(key: string): Promise<Buffer | null> {
    const entry = this.entries.get(key);
    return entry ? Buffer.from(entry) : null;
  }

  async put(key: string, data: Buffer): Promise<void> {
    this.entries.set(key, Buffer.from(data));
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
