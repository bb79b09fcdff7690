import { env } from "./env";

export const DEFAULT_HOST = env.BENCH_HOST;
export const DEFAULT_RPS = env.BENCH_RPS;
export const DEFAULT_DURATION_SECONDS = env.BENCH_DURATION_SECONDS;
export const DEFAULT_WARMUP_SECONDS = env.BENCH_WARMUP_SECONDS;
export const DEFAULT_QUERIES_FILE = env.BENCH_QUERIES_FILE;
export const DEFAULT_REPEAT_RATIO = env.BENCH_REPEAT_RATIO;
export const REQUEST_TIMEOUT_MS = env.BENCH_TIMEOUT_MS;

export const POPULAR_POOL_SIZE = 20;
// Pacing never drops below this rate, however small --rps is
export const MIN_RPS = 0.1;
export const P95_TARGET_MS = 900;
