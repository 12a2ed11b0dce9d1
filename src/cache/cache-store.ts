// Cache stores. Async so an out-of-process store can stand in without changing callers.
import { LRUCache } from "lru-cache";

export interface CacheEntry {
  /** Serialized result payload. */
  payload: string;
  createdAt: number;
  ttlMs: number;
}

export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
  size(): Promise<number>;
}

/** In-memory store bounded by entry count; least-recently-used entries go first. */
export class LruCacheStore implements CacheStore {
  private readonly entries: LRUCache<string, CacheEntry>;
  private evicted = 0;

  constructor(maxEntries: number) {
    this.entries = new LRUCache<string, CacheEntry>({
      max: maxEntries,
      dispose: (_value, _key, reason) => {
        if (reason === "evict") this.evicted++;
      },
    });
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.entries.keys());
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  get evictions(): number {
    return this.evicted;
  }
}
