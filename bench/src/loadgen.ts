// Paced traffic generation: warmup, then measurement
import { MIN_RPS, POPULAR_POOL_SIZE } from "./config/constants";
import type { LatencySample } from "./stats";

export interface BenchOptions {
  rps: number;
  durationSeconds: number;
  warmupSeconds: number;
  queries: readonly string[];
  repeatRatio: number;
}

export type Phase = "warmup" | "measure";

export interface BenchDeps {
  send: (query: string) => Promise<LatencySample>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
  onPhase?: (phase: Phase, seconds: number) => void;
}

export interface QueryPools {
  popular: readonly string[];
  all: readonly string[];
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The first min(20, n) queries (at least one) form the popular subset. */
export function splitPools(queries: readonly string[]): QueryPools {
  if (queries.length === 0) {
    throw new RangeError("query pool is empty");
  }
  const popularSize = Math.max(1, Math.min(POPULAR_POOL_SIZE, queries.length));
  return { popular: queries.slice(0, popularSize), all: queries };
}

export function pickQuery(pools: QueryPools, repeatRatio: number, random: () => number): string {
  const pool = random() < repeatRatio ? pools.popular : pools.all;
  return pool[Math.floor(random() * pool.length)];
}

export function intervalMs(rps: number): number {
  return 1000 / Math.max(rps, MIN_RPS);
}

/**
 * Issues one request at a time until the phase deadline, sleeping 1/rps after
 * each response. The sleep does not depend on the response time, so realized
 * throughput stays at or below `rps`.
 */
async function runPhase(
  seconds: number,
  opts: BenchOptions,
  pools: QueryPools,
  deps: Required<Omit<BenchDeps, "onPhase">>
): Promise<LatencySample[]> {
  const samples: LatencySample[] = [];
  const pause = intervalMs(opts.rps);
  const deadline = deps.now() + seconds * 1000;
  while (deps.now() < deadline) {
    const query = pickQuery(pools, opts.repeatRatio, deps.random);
    samples.push(await deps.send(query));
    await deps.sleep(pause);
  }
  return samples;
}

/** Returns the measurement-phase samples; warmup outcomes are discarded. */
export async function runBench(opts: BenchOptions, deps: BenchDeps): Promise<LatencySample[]> {
  const pools = splitPools(opts.queries);
  const resolved = {
    send: deps.send,
    sleep: deps.sleep ?? sleep,
    now: deps.now ?? (() => performance.now()),
    random: deps.random ?? Math.random,
  };

  if (opts.warmupSeconds > 0) {
    deps.onPhase?.("warmup", opts.warmupSeconds);
    await runPhase(opts.warmupSeconds, opts, pools, resolved);
  }

  deps.onPhase?.("measure", opts.durationSeconds);
  return await runPhase(opts.durationSeconds, opts, pools, resolved);
}
