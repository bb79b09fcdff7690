// Latency statistics for a benchmark run
import { P95_TARGET_MS } from "./config/constants";

export interface LatencySample {
  elapsedMillis: number;
  wasCacheHit: boolean;
  failed: boolean;
  error?: string;
}

export interface BenchReport {
  total: number;
  failed: number;
  hits: number;
  hitRate: number; // percent
  p50: number;
  p95: number;
  p99: number;
  mean: number;
  p95TargetMs: number;
  passed: boolean;
  failureReasons: Array<[reason: string, count: number]>; // most frequent first, at most 3
}

/**
 * Linear interpolation between closest ranks:
 * k = (N-1) * p/100, result = s[f]*(c-k) + s[c]*(k-f).
 * Sorts a copy of `values`; an empty input yields 0.
 */
export function percentile(values: readonly number[], p: number): number {
  if (!(p >= 0 && p <= 100)) {
    throw new RangeError(`percentile must be within [0, 100], got: ${p}`);
  }
  if (values.length === 0) return 0;

  const s = [...values].sort((a, b) => a - b);
  const k = (s.length - 1) * (p / 100);
  const f = Math.floor(k);
  const c = Math.min(f + 1, s.length - 1);
  if (f === c) return s[f];
  return s[f] * (c - k) + s[c] * (k - f);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function topFailureReasons(samples: readonly LatencySample[], limit = 3): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const s of samples) {
    if (!s.failed) continue;
    const reason = s.error ?? "unknown error";
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

export function summarize(samples: readonly LatencySample[], p95TargetMs = P95_TARGET_MS): BenchReport {
  const latencies = samples.map((s) => s.elapsedMillis);
  const hits = samples.filter((s) => s.wasCacheHit).length;
  const failed = samples.filter((s) => s.failed).length;
  const total = samples.length;
  const p95 = percentile(latencies, 95);

  return {
    total,
    failed,
    hits,
    hitRate: total > 0 ? (hits / total) * 100 : 0,
    p50: percentile(latencies, 50),
    p95,
    p99: percentile(latencies, 99),
    mean: mean(latencies),
    p95TargetMs,
    passed: total > 0 && p95 < p95TargetMs,
    failureReasons: topFailureReasons(samples),
  };
}
