// Liveness check; reports the configured cache store address without touching it
import type { FastifyInstance } from "fastify";
import type { HealthResponseBody } from "../../../shared/types";

export async function healthRoutes(app: FastifyInstance, redisUrl: string) {
  /**
   * GET /health
   */
  app.get<{ Reply: HealthResponseBody }>("/health", async () => {
    return { status: "ok", redis: redisUrl };
  });
}
