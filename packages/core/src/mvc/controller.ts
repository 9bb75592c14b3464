import type { HttpRequest, HttpResponse } from "@switchyard/types";

/**
 * An object that serves requests through one method. May return any value
 * a handler may return: a view name, a `View`, a `ModelAndView`, a model
 * object, a `DeferredResult` or nothing after writing the response.
 */
export interface Controller {
  handleRequest(request: HttpRequest, response: HttpResponse): unknown;

  /** Epoch milliseconds of the last change, or -1 when unknown. */
  getLastModified?(request: HttpRequest): number;
}

export function isController(handler: unknown): handler is Controller {
  return (
    typeof handler === "object" &&
    handler !== null &&
    "handleRequest" in handler &&
    typeof handler.handleRequest === "function"
  );
}
