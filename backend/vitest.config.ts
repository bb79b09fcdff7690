import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    env: {
      REDIS_URL: "memory://",
      EXACT_CACHE: "1",
      CACHE_TTL_SECONDS: "3600",
      SIM_LATENCY_MS: "0",
      SIM_JITTER_MS: "0",
      ENABLE_OTEL: "false"
    }
  }
});
