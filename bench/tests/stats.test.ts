import { describe, it, expect } from "vitest";
import { mean, percentile, summarize, type LatencySample } from "../src/stats";

function sample(elapsedMillis: number, wasCacheHit = false, error?: string): LatencySample {
  return { elapsedMillis, wasCacheHit, failed: error !== undefined, error };
}

describe("percentile", () => {
  const values = [10, 20, 30, 40, 50];

  it("interpolates between closest ranks", () => {
    expect(percentile(values, 50)).toBe(30);
    expect(percentile(values, 95)).toBeCloseTo(48, 9);
    expect(percentile(values, 99)).toBeCloseTo(49.6, 9);
  });

  it("returns the extremes at 0 and 100", () => {
    expect(percentile(values, 0)).toBe(10);
    expect(percentile(values, 100)).toBe(50);
  });

  it("sorts a copy and leaves the input untouched", () => {
    const shuffled = [50, 10, 40, 20, 30];
    expect(percentile(shuffled, 50)).toBe(30);
    expect(shuffled).toEqual([50, 10, 40, 20, 30]);
  });

  it("returns the only element for a single-sample input", () => {
    expect(percentile([7], 95)).toBe(7);
  });

  it("returns 0 for an empty input", () => {
    expect(percentile([], 95)).toBe(0);
  });

  it("is monotonic in p", () => {
    const latencies = [120, 5, 640, 33, 18, 910, 77, 2, 450, 61];
    const p50 = percentile(latencies, 50);
    const p95 = percentile(latencies, 95);
    const p99 = percentile(latencies, 99);
    expect(p50).toBeLessThanOrEqual(p95);
    expect(p95).toBeLessThanOrEqual(p99);
  });

  it("rejects p outside [0, 100]", () => {
    expect(() => percentile(values, -1)).toThrow(RangeError);
    expect(() => percentile(values, 101)).toThrow(RangeError);
    expect(() => percentile(values, Number.NaN)).toThrow(RangeError);
  });
});

describe("mean", () => {
  it("averages the values", () => {
    expect(mean([100, 200, 300, 400])).toBe(250);
  });

  it("is 0 for no values", () => {
    expect(mean([])).toBe(0);
  });
});

describe("summarize", () => {
  const samples = [sample(100, true), sample(200), sample(300, true), sample(400)];

  it("computes hit rate and latency figures", () => {
    const report = summarize(samples);
    expect(report.total).toBe(4);
    expect(report.hits).toBe(2);
    expect(report.hitRate).toBe(50);
    expect(report.failed).toBe(0);
    expect(report.p50).toBe(250);
    expect(report.p95).toBeCloseTo(385, 9);
    expect(report.mean).toBe(250);
    expect(report.p95TargetMs).toBe(900);
    expect(report.passed).toBe(true);
  });

  it("fails the verdict when p95 reaches the target", () => {
    expect(summarize(samples, 300).passed).toBe(false);
  });

  it("reports an empty run as not passed", () => {
    const report = summarize([]);
    expect(report.total).toBe(0);
    expect(report.hitRate).toBe(0);
    expect(report.p95).toBe(0);
    expect(report.passed).toBe(false);
  });

  it("counts failures and keeps the three most frequent reasons", () => {
    const report = summarize([
      sample(30_000, false, "timeout"),
      sample(5, false, "HTTP 500"),
      sample(3, false, "fetch failed"),
      sample(30_000, false, "timeout"),
      sample(4, false, "fetch failed"),
      sample(6, false, "HTTP 503"),
      sample(30_000, false, "timeout"),
      sample(50, true),
    ]);
    expect(report.failed).toBe(7);
    expect(report.total).toBe(8);
    expect(report.failureReasons).toEqual([
      ["timeout", 3],
      ["fetch failed", 2],
      ["HTTP 500", 1],
    ]);
  });
});
