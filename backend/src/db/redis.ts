import Redis from "ioredis";
import type { FastifyBaseLogger } from "fastify";
import { REDIS_COMMAND_TIMEOUT_MS } from "../config/constants";
import { MemoryCacheStore, type CacheStore } from "../services/cache";

export interface CacheConnection {
  store: CacheStore;
  close(): Promise<void>;
}

const MEMORY_SCHEME = "memory://";

/**
 * Opens the shared cache store.
 * `memory://` selects the in-process store; anything else is handed to ioredis.
 * Commands fail fast while disconnected so that a dead store reads as a miss
 * instead of stalling requests.
 */
export function connectCache(
  url: string,
  log: Pick<FastifyBaseLogger, "info" | "warn">
): CacheConnection {
  if (url.startsWith(MEMORY_SCHEME)) {
    log.warn("Using in-process cache store; entries are not shared between processes");
    return { store: new MemoryCacheStore(), close: async () => {} };
  }

  const client = new Redis(url, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    commandTimeout: REDIS_COMMAND_TIMEOUT_MS,
  });

  let lastErrorLogged = 0;
  client.on("error", (err: Error) => {
    // ioredis retries on its own; one line every 10s is enough
    if (Date.now() - lastErrorLogged > 10_000) {
      lastErrorLogged = Date.now();
      log.warn({ err }, "Redis connection error");
    }
  });
  client.on("ready", () => log.info(`✓ Redis connected: ${url}`));

  return {
    store: client,
    close: async () => {
      await client.quit().catch(() => client.disconnect());
    },
  };
}
