// Tracing: NodeSDK bootstrap (opt-in) and span helpers
import { context, trace, type Attributes } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { env } from "./env";
import { PROJECT_NAME } from "./constants";

/**
 * Starts the OpenTelemetry NodeSDK with HTTP/Fastify/ioredis auto-instrumentations.
 * Controlled via env:
 *  - ENABLE_OTEL=true
 *  - OTEL_SERVICE_NAME=qa-cache-backend
 *  - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces (default)
 */
if (env.ENABLE_OTEL) {
  const serviceName = env.OTEL_SERVICE_NAME;

  const sdk = new NodeSDK({
    serviceName,
    traceExporter: new OTLPTraceExporter({ url: env.OTEL_EXPORTER_OTLP_ENDPOINT }),
    instrumentations: [getNodeAutoInstrumentations()],
  });

  try {
    sdk.start();
    console.log(`[otel] NodeSDK started (${serviceName})`);
  } catch (err) {
    console.error("[otel] NodeSDK start failed", err);
  }

  const shutdown = () => {
    sdk
      .shutdown()
      .then(() => console.log("[otel] NodeSDK shut down"))
      .catch((err: unknown) => console.error("[otel] NodeSDK shutdown error", err));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

export const tracer = trace.getTracer(PROJECT_NAME);

export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  attrs?: Attributes
): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    if (attrs) span.setAttributes(attrs);
    try {
      return await fn();
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Attributes) {
  const span = trace.getSpan(context.active());
  span?.addEvent(name, attrs);
}
