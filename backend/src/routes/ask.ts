// POST /ask: cache-aside question answering
import type { FastifyInstance } from "fastify";
import type { AskRequestBody, AskResponseBody, MatchKind, MatchLabel } from "../../../shared/types";
import type { AskService } from "../services/ask";

export const MATCH_LABELS: Record<MatchKind, MatchLabel> = {
  exact: "exact match",
  keyword: "by words",
  not_found: "no match",
  cache: "cache",
};

const askBodySchema = {
  type: "object",
  required: ["query"],
  properties: {
    query: { type: "string" },
  },
} as const;

export async function askRoutes(app: FastifyInstance, service: AskService) {
  app.post<{ Body: AskRequestBody; Reply: AskResponseBody }>(
    "/ask",
    { schema: { body: askBodySchema } },
    async (req) => {
      const result = await service.handle(req.body.query);
      return {
        query: result.query,
        answer: result.answer,
        from_cache: result.fromCache,
        latency_ms: result.latencyMs,
        cache_key: result.cacheKey,
        retrieval: { match: MATCH_LABELS[result.matchKind] },
      };
    }
  );
}
