import * as dotenv from "dotenv";
import { fileURLToPath } from "node:url";
dotenv.config();

const DEFAULT_QA_PATH = fileURLToPath(new URL("../../data/qa.jsonl", import.meta.url));

export const env = {
  REDIS_URL: process.env.REDIS_URL || "redis://localhost:6379/0",
  REDIS_COMMAND_TIMEOUT_MS: Number(process.env.REDIS_COMMAND_TIMEOUT_MS || 500),

  CACHE_TTL_SECONDS: Number(process.env.CACHE_TTL_SECONDS || 3600),
  // "1" enables the cache path; anything else is the no-cache control run
  EXACT_CACHE: (process.env.EXACT_CACHE || "1") === "1",
  SINGLE_FLIGHT: process.env.SINGLE_FLIGHT === "true",

  SIM_LATENCY_MS: Number(process.env.SIM_LATENCY_MS || 600),
  SIM_JITTER_MS: Number(process.env.SIM_JITTER_MS || 200),

  QA_PATH: process.env.QA_PATH || DEFAULT_QA_PATH,

  HOST: process.env.HOST || "0.0.0.0",
  PORT: Number(process.env.PORT || 8088),
  CORS_ORIGIN: process.env.CORS_ORIGIN || "*",

  ENABLE_OTEL: process.env.ENABLE_OTEL === "true",
  OTEL_SERVICE_NAME: process.env.OTEL_SERVICE_NAME || "qa-cache-backend",
  OTEL_EXPORTER_OTLP_ENDPOINT:
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces"
};
