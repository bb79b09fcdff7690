import type { BenchReport } from "./stats";

function ms(v: number) {
  return v.toFixed(0);
}

export function formatReport(report: BenchReport): string {
  if (report.total === 0) {
    return ["", "=== Load test results ===", "No samples collected; nothing to report."].join("\n");
  }

  const lines = [
    "",
    "=== Load test results ===",
    `Requests: ${report.total}, failed: ${report.failed}, cache hit-rate: ${report.hitRate.toFixed(1)}%`,
    `Latency (ms): p50=${ms(report.p50)}  p95=${ms(report.p95)}  p99=${ms(report.p99)}  mean=${ms(report.mean)}`,
    `Target p95 < ${report.p95TargetMs} ms: ${report.passed ? "OK" : "NOT MET"}`,
  ];
  for (const [reason, count] of report.failureReasons) {
    lines.push(`  failure: ${reason} (x${count})`);
  }
  return lines.join("\n");
}
