// Cache-aside request handling for /ask
import { Mutex } from "async-mutex";
import type { FastifyBaseLogger } from "fastify";
import type { MatchKind } from "../../../shared/types";
import { addEvent, withSpan } from "../config/otel";
import {
  askDurationHistogram,
  askRequestsCounter,
  cacheLookupsCounter,
  cacheWriteFailuresCounter,
} from "../config/metrics";
import { cacheKeyFor, readCache, writeCache, type CacheRead, type CacheStore } from "./cache";
import type { KnowledgeBase } from "./knowledgeBase";
import type { LatencySimulator } from "./latency";
import { matchAnswer } from "./matcher";

export interface AskResult {
  query: string;
  answer: string;
  fromCache: boolean;
  latencyMs: number;
  cacheKey: string;
  matchKind: MatchKind;
}

export interface AskServiceOptions {
  store: CacheStore;
  knowledgeBase: KnowledgeBase;
  latency: LatencySimulator;
  cacheEnabled: boolean;
  ttlSeconds: number;
  /** Serialize concurrent misses per cache key; waiters are answered from the cache. */
  singleFlight?: boolean;
  log?: Pick<FastifyBaseLogger, "warn">;
  now?: () => number;
}

type Outcome = { answer: string; fromCache: boolean; matchKind: MatchKind };

export class AskService {
  private readonly locks = new Map<string, Mutex>();
  private readonly now: () => number;

  constructor(private readonly opts: AskServiceOptions) {
    if (!Number.isInteger(opts.ttlSeconds) || opts.ttlSeconds <= 0) {
      throw new RangeError(`CACHE_TTL_SECONDS must be a positive integer, got: ${opts.ttlSeconds}`);
    }
    this.now = opts.now ?? Date.now;
  }

  /**
   * Start -> CacheCheck -> HIT: respond
   *                     -> MISS: simulate -> match -> cache write -> respond
   *
   * At most one read and one write per request; under single-flight a miss reads once
   * more after acquiring the key's lock.
   * Without single-flight, concurrent misses on one key each compute and write;
   * the values are identical, so last write wins.
   */
  async handle(rawQuery: string): Promise<AskResult> {
    const t0 = this.now();
    const cacheKey = cacheKeyFor(rawQuery);

    let outcome = await this.lookup(cacheKey);
    if (!outcome) {
      outcome =
        this.opts.singleFlight && this.opts.cacheEnabled
          ? await this.computeExclusive(rawQuery, cacheKey)
          : await this.compute(rawQuery, cacheKey);
    }

    const latencyMs = this.now() - t0;
    askRequestsCounter.inc({ match: outcome.matchKind });
    askDurationHistogram.observe({ from_cache: String(outcome.fromCache) }, latencyMs / 1000);

    return {
      query: rawQuery,
      answer: outcome.answer,
      fromCache: outcome.fromCache,
      latencyMs,
      cacheKey,
      matchKind: outcome.matchKind,
    };
  }

  private async lookup(cacheKey: string): Promise<Outcome | null> {
    if (!this.opts.cacheEnabled) {
      cacheLookupsCounter.inc({ result: "disabled" });
      return null;
    }
    const read = await withSpan("ask.cache.read", () => readCache(this.opts.store, cacheKey), {
      cacheKey,
    });
    cacheLookupsCounter.inc({ result: read.status });
    return this.fromRead(read, cacheKey);
  }

  // Second read under the key's lock; not counted in qa_cache_lookups_total
  private async recheck(cacheKey: string): Promise<Outcome | null> {
    const read = await withSpan("ask.cache.recheck", () => readCache(this.opts.store, cacheKey), {
      cacheKey,
    });
    return this.fromRead(read, cacheKey);
  }

  private fromRead(read: CacheRead, cacheKey: string): Outcome | null {
    if (read.status === "hit") {
      return { answer: read.value, fromCache: true, matchKind: "cache" };
    }
    if (read.status === "error") {
      this.opts.log?.warn({ err: read.error, cacheKey }, "cache read failed; treating as miss");
    }
    return null;
  }

  private async compute(rawQuery: string, cacheKey: string): Promise<Outcome> {
    await withSpan("ask.simulate", () => this.opts.latency.delay());
    const result = await withSpan("ask.match", () =>
      matchAnswer(rawQuery, this.opts.knowledgeBase)
    );

    if (this.opts.cacheEnabled) {
      const write = await withSpan(
        "ask.cache.write",
        () => writeCache(this.opts.store, cacheKey, this.opts.ttlSeconds, result.answerText),
        { cacheKey }
      );
      if (!write.ok) {
        cacheWriteFailuresCounter.inc();
        this.opts.log?.warn({ err: write.error, cacheKey }, "cache write failed; answer not cached");
      }
    }

    return { answer: result.answerText, fromCache: false, matchKind: result.matchKind };
  }

  private async computeExclusive(rawQuery: string, cacheKey: string): Promise<Outcome> {
    let mutex = this.locks.get(cacheKey);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(cacheKey, mutex);
    }
    const lock = mutex;
    if (lock.isLocked()) addEvent("ask.single_flight.wait", { cacheKey });
    try {
      return await lock.runExclusive(async () => {
        // A previous holder may have written the entry after our first read,
        // even if its lock was already gone when we got here
        const again = await this.recheck(cacheKey);
        return again ?? (await this.compute(rawQuery, cacheKey));
      });
    } finally {
      if (!lock.isLocked() && this.locks.get(cacheKey) === lock) {
        this.locks.delete(cacheKey);
      }
    }
  }

  /** Keys with a miss currently being computed under single-flight. */
  get inFlightKeys(): number {
    return this.locks.size;
  }
}
