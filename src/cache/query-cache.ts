// Query cache: fingerprint → materialized result, lazy TTL, single-flight per fingerprint
import type { ZodType, ZodTypeDef } from "zod";
import { CacheError, errorMessage } from "../errors.js";
import type { CacheEntry, CacheStore } from "./cache-store.js";

export interface QueryCacheOptions {
  ttlMs: number;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Callers that joined an in-flight computation instead of starting one. */
  coalesced: number;
  expired: number;
  store_errors: number;
  inflight: number;
  entries: number | null;
}

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

function decode<T>(schema: Schema<T>, payload: string): T {
  return schema.parse(JSON.parse(payload));
}

function isDecodable<T>(schema: Schema<T>, payload: string): boolean {
  try {
    return schema.safeParse(JSON.parse(payload)).success;
  } catch {
    return false;
  }
}

/**
 * Memoizes expensive results by canonical fingerprint.
 *
 * Concurrent callers with the same fingerprint share one in-flight promise, so
 * `compute` runs at most once and every caller sees its result or its failure.
 * Entries are stored serialized and decoded per caller; nobody shares a mutable
 * object. A failing store is logged and bypassed.
 */
export class QueryCache {
  private readonly inflight = new Map<string, Promise<string>>();
  private readonly now: () => number;
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private coalesced = 0;
  private expired = 0;
  private storeErrors = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly options: QueryCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async getOrCompute<T>(
    fingerprint: string,
    schema: Schema<T>,
    compute: () => Promise<T>,
    ttlMs: number = this.options.ttlMs,
  ): Promise<T> {
    const pending = this.inflight.get(fingerprint);
    if (pending) {
      this.coalesced++;
      return decode(schema, await pending);
    }

    const run = this.resolve(fingerprint, schema, compute, ttlMs);
    this.inflight.set(fingerprint, run);
    try {
      return decode(schema, await run);
    } finally {
      if (this.inflight.get(fingerprint) === run) this.inflight.delete(fingerprint);
    }
  }

  /**
   * Drops every entry whose fingerprint starts with `prefix` ("" drops all).
   * Computations already running keep their waiters but do not store their result.
   */
  async invalidate(prefix = ""): Promise<number> {
    this.generation++;

    let keys: string[];
    try {
      keys = await this.store.keys();
    } catch (e) {
      throw new CacheError("read", { cause: e });
    }

    let removed = 0;
    for (const key of keys) {
      if (!key.startsWith(prefix)) continue;
      try {
        if (await this.store.delete(key)) removed++;
      } catch (e) {
        throw new CacheError("delete", { cause: e });
      }
    }
    console.error(`[cache] Invalidated ${removed} entr${removed === 1 ? "y" : "ies"} (prefix "${prefix}")`);
    return removed;
  }

  async stats(): Promise<CacheStats> {
    let entries: number | null = null;
    try {
      entries = await this.store.size();
    } catch (e) {
      this.report(new CacheError("read", { cause: e }));
    }
    return {
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
      expired: this.expired,
      store_errors: this.storeErrors,
      inflight: this.inflight.size,
      entries,
    };
  }

  private async resolve<T>(
    fingerprint: string,
    schema: Schema<T>,
    compute: () => Promise<T>,
    ttlMs: number,
  ): Promise<string> {
    const generation = this.generation;
    const cached = await this.read(fingerprint, schema);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const payload = JSON.stringify(await compute());
    // An invalidation while computing means the result may predate a data reload
    if (generation === this.generation) {
      await this.write(fingerprint, { payload, createdAt: this.now(), ttlMs });
    }
    return payload;
  }

  private async read<T>(fingerprint: string, schema: Schema<T>): Promise<string | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(fingerprint);
    } catch (e) {
      this.report(new CacheError("read", { cause: e }));
      return undefined;
    }
    if (!entry) return undefined;

    if (this.now() - entry.createdAt > entry.ttlMs) {
      this.expired++;
      await this.remove(fingerprint);
      return undefined;
    }
    if (!isDecodable(schema, entry.payload)) {
      console.error(`[cache] Discarding undecodable entry ${fingerprint}`);
      await this.remove(fingerprint);
      return undefined;
    }
    return entry.payload;
  }

  private async write(fingerprint: string, entry: CacheEntry): Promise<void> {
    try {
      await this.store.set(fingerprint, entry);
    } catch (e) {
      this.report(new CacheError("write", { cause: e }));
    }
  }

  private async remove(fingerprint: string): Promise<void> {
    try {
      await this.store.delete(fingerprint);
    } catch (e) {
      this.report(new CacheError("delete", { cause: e }));
    }
  }

  private report(error: CacheError): void {
    this.storeErrors++;
    console.error(`[cache] ${error.message}, bypassing cache:`, errorMessage(error.cause));
  }
}
