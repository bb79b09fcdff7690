import { register, Counter, Histogram } from "prom-client";

export const askRequestsCounter = new Counter({
  name: "qa_ask_requests_total",
  help: "Answered /ask requests by match kind.",
  labelNames: ["match"],
});

export const askDurationHistogram = new Histogram({
  name: "qa_ask_duration_seconds",
  help: "Time spent answering /ask.",
  labelNames: ["from_cache"],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 0.75, 0.9, 1, 2],
});

// Cache Metrics
export const cacheLookupsCounter = new Counter({
  name: "qa_cache_lookups_total",
  help: "Cache lookups by result (hit, miss, error, disabled).",
  labelNames: ["result"],
});

export const cacheWriteFailuresCounter = new Counter({
  name: "qa_cache_write_failures_total",
  help: "Cache writes that failed and were discarded.",
});

export const simulatedDelayHistogram = new Histogram({
  name: "qa_simulated_delay_seconds",
  help: "Delays produced by the latency simulator.",
  buckets: [0.1, 0.25, 0.5, 0.6, 0.7, 0.8, 0.9, 1, 2],
});

export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
