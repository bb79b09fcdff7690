import * as dotenv from "dotenv";
dotenv.config();

// Defaults for the load generator; CLI flags override these
export const env = {
  BENCH_HOST: process.env.BENCH_HOST || "http://127.0.0.1:8088",
  BENCH_RPS: Number(process.env.BENCH_RPS || 5),
  BENCH_DURATION_SECONDS: Number(process.env.BENCH_DURATION_SECONDS || 120),
  BENCH_WARMUP_SECONDS: Number(process.env.BENCH_WARMUP_SECONDS || 10),
  BENCH_QUERIES_FILE: process.env.BENCH_QUERIES_FILE || "data/queries.txt",
  BENCH_REPEAT_RATIO: Number(process.env.BENCH_REPEAT_RATIO || 0.7),
  BENCH_TIMEOUT_MS: Number(process.env.BENCH_TIMEOUT_MS || 30_000)
};
