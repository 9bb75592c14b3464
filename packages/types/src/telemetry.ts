export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogAttributes = Record<string, unknown>;

/** Values OpenTelemetry accepts as span attributes. */
export type SpanAttributes = Record<string, string | number | boolean>;

/** Structured logger handed to every dispatch component. */
export interface SwitchyardLogger {
  debug(message: string, attributes?: LogAttributes): void;
  info(message: string, attributes?: LogAttributes): void;
  warn(message: string, attributes?: LogAttributes): void;
  error(message: string, attributes?: LogAttributes): void;

  /** A logger whose records carry `name` and the given attributes. */
  child(name: string, attributes?: LogAttributes): SwitchyardLogger;

  withContext(attributes: LogAttributes): SwitchyardLogger;
}

export interface SwitchyardTracer {
  /**
   * Runs `fn` inside a span. The span ends when `fn` settles and records
   * the error when it rejects.
   */
  withSpan<T>(
    name: string,
    fn: (span: SwitchyardSpan) => T | Promise<T>,
    attributes?: SpanAttributes,
  ): Promise<T>;
}

export interface SwitchyardSpan {
  setAttributes(attributes: SpanAttributes): void;
  recordError(error: Error): void;
}
