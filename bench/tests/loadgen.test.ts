import { describe, it, expect } from "vitest";
import { intervalMs, pickQuery, runBench, splitPools, type BenchOptions, type Phase } from "../src/loadgen";
import { summarize, type LatencySample } from "../src/stats";

const queries = Array.from({ length: 25 }, (_, i) => `q${i}`);

function sequence(...values: number[]) {
  let i = 0;
  return () => values[i++ % values.length];
}

/** Virtual clock: each request takes `costMs`, sleeps advance time instantly. */
function harness(costMs: number, respond: (query: string) => boolean = () => false) {
  let clock = 0;
  const sent: string[] = [];
  const sleeps: number[] = [];
  const phases: Array<[Phase, number]> = [];
  return {
    sent,
    sleeps,
    phases,
    deps: {
      now: () => clock,
      sleep: async (ms: number) => {
        sleeps.push(ms);
        clock += ms;
      },
      send: async (query: string): Promise<LatencySample> => {
        sent.push(query);
        clock += costMs;
        return { elapsedMillis: costMs, wasCacheHit: respond(query), failed: false };
      },
      random: sequence(0.1, 0.5),
      onPhase: (phase: Phase, seconds: number) => {
        phases.push([phase, seconds]);
      },
    },
  };
}

const base: BenchOptions = { rps: 5, durationSeconds: 2, warmupSeconds: 1, queries, repeatRatio: 0.7 };

describe("splitPools", () => {
  it("takes the first 20 queries as the popular subset", () => {
    const pools = splitPools(queries);
    expect(pools.popular).toEqual(queries.slice(0, 20));
    expect(pools.all).toHaveLength(25);
  });

  it("uses the whole list when it is shorter than 20", () => {
    expect(splitPools(["a", "b"]).popular).toEqual(["a", "b"]);
  });

  it("rejects an empty list", () => {
    expect(() => splitPools([])).toThrow(RangeError);
  });
});

describe("pickQuery", () => {
  const pools = splitPools(queries);

  it("draws from the popular subset when the first draw is below the ratio", () => {
    expect(pickQuery(pools, 0.7, sequence(0.1, 0.5))).toBe("q10");
  });

  it("draws from the full list otherwise", () => {
    expect(pickQuery(pools, 0.7, sequence(0.9, 0.5))).toBe("q12");
  });

  it("only uses popular queries at ratio 1", () => {
    expect(pickQuery(pools, 1, () => 0.999)).toBe("q19");
  });

  it("ignores the popular subset at ratio 0", () => {
    expect(pickQuery(pools, 0, () => 0.999)).toBe("q24");
  });
});

describe("intervalMs", () => {
  it("spaces requests 1/rps apart", () => {
    expect(intervalMs(5)).toBe(200);
  });

  it("clamps very low rates to 0.1 rps", () => {
    expect(intervalMs(0.01)).toBe(10_000);
  });
});

describe("runBench", () => {
  it("discards warmup samples and paces sends at 1/rps after each response", async () => {
    const h = harness(50);
    const samples = await runBench(base, h.deps);

    // warmup: t=0,250,500,750; measure: t=1000..2750 in 250 ms steps
    expect(h.sent).toHaveLength(12);
    expect(samples).toHaveLength(8);
    expect(h.sleeps.every((ms) => ms === 200)).toBe(true);
    expect(h.phases).toEqual([
      ["warmup", 1],
      ["measure", 2],
    ]);
  });

  it("skips the warmup phase when it is zero", async () => {
    const h = harness(50);
    const samples = await runBench({ ...base, warmupSeconds: 0 }, h.deps);
    expect(samples).toHaveLength(8);
    expect(h.sent).toHaveLength(8);
    expect(h.phases).toEqual([["measure", 2]]);
  });

  it("returns no samples for a zero-length measurement", async () => {
    const h = harness(50);
    const samples = await runBench({ ...base, warmupSeconds: 0, durationSeconds: 0 }, h.deps);
    expect(samples).toEqual([]);
    expect(h.sent).toEqual([]);
  });

  it("only sends popular queries at ratio 1", async () => {
    const h = harness(50);
    await runBench({ ...base, repeatRatio: 1 }, h.deps);
    const popular = new Set(queries.slice(0, 20));
    expect(h.sent.every((q) => popular.has(q))).toBe(true);
  });

  // Stand-in for the service: a cache-aside lookup that only stores answers when caching is on
  function service(cacheEnabled: boolean) {
    const cached = new Set<string>();
    return (query: string) => {
      if (cached.has(query)) return true;
      if (cacheEnabled) cached.add(query);
      return false;
    };
  }

  it("reports a hit rate near 100% for a warm cache with ratio 1", async () => {
    const h = harness(50, service(true));
    const samples = await runBench({ ...base, queries: ["only one"], repeatRatio: 1 }, h.deps);
    expect(samples).toHaveLength(8);
    expect(summarize(samples).hitRate).toBe(100);
  });

  it("reports a 0% hit rate against the no-cache control mode", async () => {
    const h = harness(50, service(false));
    const samples = await runBench({ ...base, queries: ["only one"], repeatRatio: 1 }, h.deps);
    expect(samples).toHaveLength(8);
    expect(summarize(samples).hitRate).toBe(0);
  });

  it("counts the first request of an unwarmed run as a miss", async () => {
    const h = harness(50, service(true));
    const samples = await runBench({ ...base, warmupSeconds: 0, queries: ["only one"], repeatRatio: 1 }, h.deps);
    expect(samples.map((s) => s.wasCacheHit)).toEqual([false, true, true, true, true, true, true, true]);
    expect(summarize(samples).hitRate).toBe(87.5);
  });
});
