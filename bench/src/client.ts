// HTTP probe for POST /ask
import type { AskRequestBody } from "../../shared/types";
import { REQUEST_TIMEOUT_MS } from "./config/constants";
import type { LatencySample } from "./stats";

export interface SendOptions {
  timeoutMs?: number;
  now?: () => number;
}

export function askUrl(host: string) {
  return `${host.replace(/\/+$/, "")}/ask`;
}

function isCacheHit(data: unknown): boolean {
  return typeof data === "object" && data !== null && "from_cache" in data && data.from_cache === true;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  return error.name === "TimeoutError" ? "timeout" : error.message;
}

/**
 * Sends one query and times the full round trip, body included.
 * Failures (network, timeout, non-2xx, unreadable body) still produce a sample
 * with the elapsed time, so they count against the latency figures.
 */
export async function sendAsk(host: string, query: string, opts: SendOptions = {}): Promise<LatencySample> {
  const { timeoutMs = REQUEST_TIMEOUT_MS, now = () => performance.now() } = opts;
  const body: AskRequestBody = { query };

  const t0 = now();
  try {
    const response = await fetch(askUrl(host), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      await response.body?.cancel();
      return { elapsedMillis: now() - t0, wasCacheHit: false, failed: true, error: `HTTP ${response.status}` };
    }
    const data: unknown = await response.json();
    return { elapsedMillis: now() - t0, wasCacheHit: isCacheHit(data), failed: false };
  } catch (error) {
    return { elapsedMillis: now() - t0, wasCacheHit: false, failed: true, error: describeFailure(error) };
  }
}
