import { describe, it, expect } from "vitest";
import {
  MemoryCacheStore,
  cacheKeyFor,
  normalize,
  readCache,
  writeCache,
  type CacheStore,
} from "../src/services/cache";

const brokenStore: CacheStore = {
  get: async () => {
    throw new Error("connection refused");
  },
  setex: async () => {
    throw new Error("connection refused");
  },
};

describe("normalize", () => {
  it("trims, lower-cases and collapses whitespace runs", () => {
    expect(normalize("  What   IS\t\n Caching?  ")).toBe("what is caching?");
  });

  it("maps whitespace-only input to the empty key", () => {
    expect(normalize(" \t ")).toBe("");
  });

  it("is idempotent", () => {
    const once = normalize("  A  b   C ");
    expect(normalize(once)).toBe(once);
  });
});

describe("cacheKeyFor", () => {
  it("prefixes the normalized query", () => {
    expect(cacheKeyFor("  Hello   World ")).toBe("qa:hello world");
  });

  it("gives cosmetically different queries the same key", () => {
    expect(cacheKeyFor("what is TTL")).toBe(cacheKeyFor("What  is ttl "));
  });
});

describe("readCache / writeCache", () => {
  it("reports a miss, then a hit after a write", async () => {
    const store = new MemoryCacheStore();
    expect(await readCache(store, "qa:x")).toEqual({ status: "miss" });
    expect(await writeCache(store, "qa:x", 60, "answer")).toEqual({ ok: true });
    expect(await readCache(store, "qa:x")).toEqual({ status: "hit", value: "answer" });
  });

  it("turns store failures into values instead of throwing", async () => {
    const read = await readCache(brokenStore, "qa:x");
    expect(read.status).toBe("error");
    if (read.status === "error") expect(read.error.message).toBe("connection refused");

    const write = await writeCache(brokenStore, "qa:x", 60, "answer");
    expect(write.ok).toBe(false);
    if (!write.ok) expect(write.error.message).toBe("connection refused");
  });

  it("wraps non-Error rejections", async () => {
    const store: CacheStore = {
      get: () => Promise.reject("timeout"),
      setex: () => Promise.reject("timeout"),
    };
    const read = await readCache(store, "qa:x");
    expect(read.status === "error" && read.error.message).toBe("timeout");
  });
});

describe("MemoryCacheStore", () => {
  it("expires entries once their TTL has elapsed", async () => {
    let now = 1_000;
    const store = new MemoryCacheStore(() => now);
    await store.setex("qa:k", 10, "v");

    now += 9_999;
    expect(await store.get("qa:k")).toBe("v");

    now += 1;
    expect(await store.get("qa:k")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("overwrites an entry and restarts its TTL", async () => {
    let now = 0;
    const store = new MemoryCacheStore(() => now);
    await store.setex("qa:k", 1, "first");
    now = 900;
    await store.setex("qa:k", 1, "second");
    now = 1_500;
    expect(await store.get("qa:k")).toBe("second");
  });
});
