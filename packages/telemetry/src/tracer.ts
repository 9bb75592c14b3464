import {
  trace,
  context as otelContext,
  SpanStatusCode,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { SpanAttributes, SwitchyardSpan, SwitchyardTracer } from "@switchyard/types";
import type { TelemetryConfig } from "./env";
import { NOOP_TRACER } from "./noop";

export class OTelSpan implements SwitchyardSpan {
  constructor(private readonly span: Span) {}

  setAttributes(attributes: SpanAttributes): void {
    this.span.setAttributes(attributes);
  }

  recordError(error: Error): void {
    this.span.recordException(error);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  }
}

/**
 * Opens one span per call on the global OpenTelemetry tracer provider.
 * Without a registered provider the API hands out non-recording spans.
 */
export class OTelTracer implements SwitchyardTracer {
  private readonly tracer: Tracer;

  constructor(name = "switchyard") {
    this.tracer = trace.getTracer(name);
  }

  async withSpan<T>(
    name: string,
    fn: (span: SwitchyardSpan) => T | Promise<T>,
    attributes?: SpanAttributes,
  ): Promise<T> {
    const span = this.tracer.startSpan(name, { attributes });
    const ctx = trace.setSpan(otelContext.active(), span);

    return otelContext.with(ctx, async () => {
      const wrapped = new OTelSpan(span);
      try {
        const result = await fn(wrapped);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        if (error instanceof Error) wrapped.recordError(error);
        else span.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        span.end();
      }
    });
  }
}

export function createTracer(config: TelemetryConfig): SwitchyardTracer {
  return config.tracingEnabled ? new OTelTracer(config.serviceName) : NOOP_TRACER;
}
