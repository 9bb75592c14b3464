import type { HttpRequest, HttpResponse, Ordered } from "@switchyard/types";
import type { HandlerExecutionChain } from "./handlers/execution-chain";
import type { ModelAndView } from "./views/model-and-view";

/** Maps a request to the handler that serves it, plus its interceptors. */
export interface HandlerMapping extends Ordered {
  /** Resolves to null when this mapping has no handler for the request. */
  getHandler(request: HttpRequest): Promise<HandlerExecutionChain | null>;
}

/**
 * Hooks around handler execution. Every method is optional; a missing
 * `preHandle` counts as returning true.
 */
export interface HandlerInterceptor {
  /** Return false to stop dispatch; the interceptor must then have written the response. */
  preHandle?(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): boolean | Promise<boolean>;

  /** Runs after the handler, before rendering. Not called when the handler threw. */
  postHandle?(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    modelAndView: ModelAndView | null,
  ): void | Promise<void>;

  /**
   * Runs once the request is finished, for every interceptor whose
   * `preHandle` returned. `error` is the failure captured during handling.
   */
  afterCompletion?(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    error: Error | null,
  ): void | Promise<void>;

  /** Runs in place of `postHandle`/`afterCompletion` when a handler went async. */
  afterConcurrentHandlingStarted?(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): void | Promise<void>;
}

/** Invokes one kind of handler on behalf of the dispatcher. */
export interface HandlerAdapter extends Ordered {
  supports(handler: unknown): boolean;

  /** Resolves to null when the handler wrote the response itself. */
  handle(request: HttpRequest, response: HttpResponse, handler: unknown): Promise<ModelAndView | null>;

  /** Epoch milliseconds of the resource's last change, or -1 when unknown. */
  getLastModified(request: HttpRequest, handler: unknown): number | Promise<number>;
}

/**
 * Turns a handler failure into a response. Resolve to null to pass the
 * error on, or to `ModelAndView.empty()` when the response was written
 * directly.
 */
export interface HandlerExceptionResolver extends Ordered {
  resolveException(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    error: Error,
  ): ModelAndView | null | Promise<ModelAndView | null>;
}

export interface View {
  readonly contentType?: string;
  render(
    model: Readonly<Record<string, unknown>>,
    request: HttpRequest,
    response: HttpResponse,
  ): void | Promise<void>;
}

export interface ViewResolver extends Ordered {
  resolveViewName(viewName: string, locale: string): View | null | Promise<View | null>;
}

export interface LocaleResolver {
  resolveLocale(request: HttpRequest): string;
}

/** Supplies a view name for results that carry a model but no view. */
export interface RequestToViewNameTranslator {
  getViewName(request: HttpRequest): string | null;
}
