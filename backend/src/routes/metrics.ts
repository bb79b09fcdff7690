import type { FastifyInstance } from "fastify";
import { getContentType, getMetrics } from "../config/metrics";

export async function metricsRoutes(app: FastifyInstance) {
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getContentType());
    return await getMetrics();
  });
}
