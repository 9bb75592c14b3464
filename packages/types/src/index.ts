export type { Ordered, Comparator } from "./common";

export type { HttpMethod, DispatchKind, HttpRequest, HttpResponse } from "./http";

export type {
  LogLevel,
  LogAttributes,
  SpanAttributes,
  SwitchyardLogger,
  SwitchyardTracer,
  SwitchyardSpan,
} from "./telemetry";
