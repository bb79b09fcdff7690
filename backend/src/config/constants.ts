import { env } from "./env";

export const PROJECT_NAME = "qa-cache";
export const HOST = env.HOST;
export const PORT_BACKEND = env.PORT;
export const CORS_ORIGIN = env.CORS_ORIGIN;

export const REDIS_URL = env.REDIS_URL;
export const REDIS_COMMAND_TIMEOUT_MS = env.REDIS_COMMAND_TIMEOUT_MS;

export const CACHE_ENABLED = env.EXACT_CACHE;
export const CACHE_TTL_SECONDS = env.CACHE_TTL_SECONDS;
export const CACHE_KEY_PREFIX = "qa:";
export const SINGLE_FLIGHT = env.SINGLE_FLIGHT;

export const SIM_LATENCY_MS = env.SIM_LATENCY_MS;
export const SIM_JITTER_MS = env.SIM_JITTER_MS;

export const QA_PATH = env.QA_PATH;

export const NOT_FOUND_ANSWER =
  "No answer found in the knowledge base. Try rephrasing the query.";
// Tokens this short or shorter are ignored by the word-overlap matcher
export const MIN_TOKEN_LENGTH = 3;
