/**
 * OpenTelemetry tracing for installer runs.
 *
 * Spans are always created through @opentelemetry/api; they are only exported
 * when OTEL_EXPORTER_OTLP_ENDPOINT is set and startTracing() has run.
 */

import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-grpc";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import { errorMessage } from "./errors.js";

let sdk: NodeSDK | null = null;

export function startTracing(endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT): boolean {
  if (!endpoint || sdk) return false;
  sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: "sbx-installer",
    }),
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
  });
  sdk.start();
  return true;
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const current = sdk;
  sdk = null;
  await current.shutdown();
}

const tracer = trace.getTracer("sbx-installer");

export function withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
      if (err instanceof Error) span.recordException(err);
      throw err;
    } finally {
      span.end();
    }
  });
}
