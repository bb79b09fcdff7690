// Cache-aside primitives: key normalization, the store seam and best-effort read/write
import { CACHE_KEY_PREFIX } from "../config/constants";

/**
 * Minimal key-value surface the handler needs. An ioredis client satisfies it as-is.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<unknown>;
}

export type CacheRead =
  | { status: "hit"; value: string }
  | { status: "miss" }
  | { status: "error"; error: Error };

export type CacheWrite = { ok: true } | { ok: false; error: Error };

/**
 * Canonical lookup key: trimmed, lower-cased, whitespace runs collapsed to one space.
 * Used for both cache keys and knowledge-base keys.
 */
export function normalize(s: string) {
  return s.toLowerCase().replace(/\s+/g, " ").trim();
}

export function cacheKeyFor(rawQuery: string) {
  return CACHE_KEY_PREFIX + normalize(rawQuery);
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

// Read errors are reported, never thrown; callers treat them as a miss.
export async function readCache(store: CacheStore, key: string): Promise<CacheRead> {
  try {
    const value = await store.get(key);
    return value === null ? { status: "miss" } : { status: "hit", value };
  } catch (e) {
    return { status: "error", error: toError(e) };
  }
}

export async function writeCache(
  store: CacheStore,
  key: string,
  ttlSeconds: number,
  value: string
): Promise<CacheWrite> {
  try {
    await store.setex(key, ttlSeconds, value);
    return { ok: true };
  } catch (e) {
    return { ok: false, error: toError(e) };
  }
}

type Entry = { value: string; exp: number };

/**
 * In-process store with per-entry expiry. Backs `REDIS_URL=memory://` and the tests.
 */
export class MemoryCacheStore implements CacheStore {
  private store = new Map<string, Entry>();

  constructor(private now: () => number = Date.now) { }

  async get(key: string): Promise<string | null> {
    const e = this.store.get(key);
    if (!e) return null;
    if (this.now() >= e.exp) {
      this.store.delete(key);
      return null;
    }
    return e.value;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<"OK"> {
    this.store.set(key, { value, exp: this.now() + ttlSeconds * 1000 });
    return "OK";
  }

  get size() {
    return this.store.size;
  }
}
