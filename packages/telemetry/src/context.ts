import { propagation, ROOT_CONTEXT, type Context } from "@opentelemetry/api";
import type { HttpRequest } from "@switchyard/types";

const TRACE_HEADERS = ["traceparent", "tracestate", "baggage"] as const;

/**
 * Builds the parent OTel context from the W3C trace headers of the request.
 * Requests without trace headers start from the root context.
 */
export function extractTraceContext(request: HttpRequest): Context {
  const carrier: Record<string, string> = {};
  for (const name of TRACE_HEADERS) {
    const value = request.headers[name];
    const first = Array.isArray(value) ? value[0] : value;
    if (first) carrier[name] = first;
  }

  if (Object.keys(carrier).length === 0) return ROOT_CONTEXT;
  return propagation.extract(ROOT_CONTEXT, carrier);
}
