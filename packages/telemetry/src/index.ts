export { readTelemetryEnv } from "./env";
export type { TelemetryConfig } from "./env";

export { PinoLogger, createLogger } from "./logger";
export { requestStore, getRequestLogger, getRequestId, currentLogger } from "./request-context";
export type { DispatchScope } from "./request-context";

export { extractTraceContext } from "./context";
export { OTelTracer, OTelSpan, createTracer } from "./tracer";
export { NOOP_TRACER, SILENT_LOGGER } from "./noop";
