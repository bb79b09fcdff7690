import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    env: {
      BENCH_HOST: "http://127.0.0.1:8088",
      BENCH_RPS: "5",
      BENCH_DURATION_SECONDS: "120",
      BENCH_WARMUP_SECONDS: "10",
      BENCH_QUERIES_FILE: "data/queries.txt",
      BENCH_REPEAT_RATIO: "0.7"
    }
  }
});
