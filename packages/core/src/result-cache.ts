import { LRUCache } from "lru-cache";
import { sha256hex } from "./embedding.js";

export const DEFAULT_CACHE_TTL_MS = 30 * 60 * 1000;

export type CacheArgs = Record<string, string | number | boolean | null | undefined>;

/**
 * Digest of a tool call: the tool name plus its arguments sorted by key.
 * Arguments left undefined do not take part, so `{ topK: undefined }` and
 * `{}` share an entry.
 */
export function cacheKey(tool: string, args: CacheArgs): string {
  const entries = Object.entries(args)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return sha256hex(`${tool}:${JSON.stringify(entries)}`);
}

export const DEFAULT_CACHE_MAX_ENTRIES = 500;

export interface ResultCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  /** Clock in milliseconds; entries are aged against it. */
  now?: () => number;
}

/**
 * Memory-resident response cache with a fixed TTL. An entry is stale once
 * `ttlMs` has elapsed since it was stored; stale entries are dropped when
 * looked up, nothing sweeps them in the background.
 */
export class ResultCache<T extends {}> {
  private readonly cache: LRUCache<string, T>;

  constructor(options: ResultCacheOptions = {}) {
    const now = options.now ?? Date.now;
    this.cache = new LRUCache<string, T>({
      max: options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
      ttl: options.ttlMs ?? DEFAULT_CACHE_TTL_MS,
      // Read the clock on every lookup instead of caching it for a tick.
      ttlResolution: 0,
      perf: { now },
    });
  }

  get size(): number {
    return this.cache.size;
  }

  get(key: string): T | undefined {
    // lru-cache treats an entry as live up to and including its TTL.
    if (this.cache.getRemainingTTL(key) <= 0) {
      this.cache.delete(key);
      return undefined;
    }
    return this.cache.get(key);
  }

  put(key: string, value: T): void {
    this.cache.set(key, value);
  }

  clear(): void {
    this.cache.clear();
  }
}
