import type { HttpMethod } from "@switchyard/types";
import { NotFoundException, ServiceUnavailableException } from "./http-exception";

/** Thrown for unmatched requests when `throwIfNoHandlerFound` is on. */
export class NoHandlerFoundException extends NotFoundException {
  constructor(
    public readonly method: HttpMethod,
    public readonly path: string,
  ) {
    super(`No handler found for ${method} ${path}`, { method, path });
    this.name = "NoHandlerFoundException";
  }
}

export class AsyncRequestTimeoutException extends ServiceUnavailableException {
  constructor(public readonly timeoutMs: number) {
    super(`Async request timed out after ${timeoutMs}ms`);
    this.name = "AsyncRequestTimeoutException";
  }
}

export class AsyncRequestCancelledError extends Error {
  constructor(reason = "Async request was cancelled") {
    super(reason);
    this.name = "AsyncRequestCancelledError";
  }
}

/**
 * Misconfiguration of the dispatcher or its mappings. These skip the
 * exception resolvers and reach the caller of `dispatch`.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AmbiguousMappingError extends ConfigurationError {
  constructor(
    message: string,
    public readonly handlers: readonly string[],
  ) {
    super(message);
    this.name = "AmbiguousMappingError";
  }
}

export class AdapterNotFoundError extends ConfigurationError {
  constructor(public readonly handler: string) {
    super(`No adapter for handler ${handler}: register a HandlerAdapter that supports it`);
    this.name = "AdapterNotFoundError";
  }
}

export class ViewResolutionError extends Error {
  constructor(public readonly viewName: string | null) {
    super(
      viewName === null
        ? "ModelAndView has neither a view name nor a View to render"
        : `Could not resolve view with name "${viewName}"`,
    );
    this.name = "ViewResolutionError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
