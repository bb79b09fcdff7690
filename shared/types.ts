// Shared wire types for the /ask service and its load generator

export type MatchKind = "exact" | "keyword" | "not_found" | "cache";

// Human-readable labels sent in `retrieval.match`
export type MatchLabel = "exact match" | "by words" | "no match" | "cache";

export interface AskRequestBody {
  query: string;
}

export interface AskResponseBody {
  query: string;
  answer: string;
  from_cache: boolean;
  latency_ms: number; // integer, handler wall-clock time
  cache_key: string;
  retrieval: {
    match: MatchLabel;
  };
}

export interface HealthResponseBody {
  status: "ok";
  redis: string;
}

// Records

export interface QueryRecord {
  readonly question: string;
  readonly answer: string;
}
