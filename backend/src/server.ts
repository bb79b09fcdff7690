/* Backend Server Entry Point */
import "./config/otel"; // Bootstrap OpenTelemetry before loading instrumented modules
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { pino } from "pino";
import { v4 as uuidv4 } from "uuid";
import { env } from "./config/env";
import {
  CACHE_ENABLED,
  CACHE_TTL_SECONDS,
  CORS_ORIGIN,
  HOST,
  PORT_BACKEND,
  QA_PATH,
  REDIS_URL,
  SIM_JITTER_MS,
  SIM_LATENCY_MS,
  SINGLE_FLIGHT,
} from "./config/constants";
import { connectCache } from "./db/redis";
import { askRoutes } from "./routes/ask";
import { healthRoutes } from "./routes/health";
import { metricsRoutes } from "./routes/metrics";
import { AskService } from "./services/ask";
import type { CacheStore } from "./services/cache";
import { KnowledgeBase, loadKnowledgeBase } from "./services/knowledgeBase";
import { LatencySimulator } from "./services/latency";

export interface BuildOptions {
  store: CacheStore;
  knowledgeBase?: KnowledgeBase;
  latency?: LatencySimulator;
  cacheEnabled?: boolean;
  ttlSeconds?: number;
  singleFlight?: boolean;
  redisUrl?: string;
  logger?: boolean | FastifyBaseLogger;
}

export async function build(opts: BuildOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? true,
    genReqId: () => uuidv4(),
    // Reject `{"query": 42}` instead of answering for "42"
    ajv: { customOptions: { coerceTypes: false } },
  });

  const service = new AskService({
    store: opts.store,
    knowledgeBase: opts.knowledgeBase ?? KnowledgeBase.empty(),
    latency: opts.latency ?? new LatencySimulator(SIM_LATENCY_MS, SIM_JITTER_MS),
    cacheEnabled: opts.cacheEnabled ?? CACHE_ENABLED,
    ttlSeconds: opts.ttlSeconds ?? CACHE_TTL_SECONDS,
    singleFlight: opts.singleFlight ?? SINGLE_FLIGHT,
    log: app.log,
  });

  await app.register(cors, { origin: CORS_ORIGIN });

  await healthRoutes(app, opts.redisUrl ?? REDIS_URL);
  await metricsRoutes(app);
  await askRoutes(app, service);

  return app;
}

async function start() {
  const log = pino();
  const knowledgeBase = await loadKnowledgeBase(QA_PATH, log);
  const cache = connectCache(REDIS_URL, log);

  const app = await build({ store: cache.store, knowledgeBase, logger: log });
  app.addHook("onClose", async () => {
    await cache.close();
  });

  await app.listen({ port: PORT_BACKEND, host: HOST });
  app.log.info(
    `Cache ${CACHE_ENABLED ? "enabled" : "DISABLED (control run)"}; ` +
      `simulated latency ${SIM_LATENCY_MS}+[0..${SIM_JITTER_MS}] ms; ttl ${CACHE_TTL_SECONDS}s`
  );

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info(`${signal} received, shutting down`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Start server if run directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err) => {
    console.error("❌ FATAL: backend failed to start:", err);
    console.error(`   Config: PORT=${env.PORT} REDIS_URL=${env.REDIS_URL} QA_PATH=${env.QA_PATH}`);
    process.exit(1);
  });
}
