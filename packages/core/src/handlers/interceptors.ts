import type { HttpRequest, HttpResponse } from "@switchyard/types";
import { matchPath } from "@switchyard/common";
import type { HandlerInterceptor } from "../interfaces";
import type { ModelAndView } from "../views/model-and-view";

/**
 * Applies an interceptor only to paths matching one of the include
 * patterns (all paths when none are given) and none of the excludes.
 */
export class MappedInterceptor implements HandlerInterceptor {
  constructor(
    readonly includePatterns: readonly string[],
    readonly excludePatterns: readonly string[],
    readonly interceptor: HandlerInterceptor,
  ) {}

  static forPaths(includePatterns: readonly string[], interceptor: HandlerInterceptor): MappedInterceptor {
    return new MappedInterceptor(includePatterns, [], interceptor);
  }

  matches(path: string): boolean {
    if (this.excludePatterns.some((pattern) => matchPath(pattern, path))) return false;
    if (this.includePatterns.length === 0) return true;
    return this.includePatterns.some((pattern) => matchPath(pattern, path));
  }

  async preHandle(request: HttpRequest, response: HttpResponse, handler: unknown): Promise<boolean> {
    return this.interceptor.preHandle ? this.interceptor.preHandle(request, response, handler) : true;
  }

  async postHandle(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    modelAndView: ModelAndView | null,
  ): Promise<void> {
    await this.interceptor.postHandle?.(request, response, handler, modelAndView);
  }

  async afterCompletion(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    error: Error | null,
  ): Promise<void> {
    await this.interceptor.afterCompletion?.(request, response, handler, error);
  }

  async afterConcurrentHandlingStarted(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): Promise<void> {
    await this.interceptor.afterConcurrentHandlingStarted?.(request, response, handler);
  }
}

/**
 * Interceptor that sees only the request and the model, never the handler
 * or the response, and cannot stop dispatch.
 */
export interface WebRequestInterceptor {
  preHandle?(request: HttpRequest): void | Promise<void>;
  postHandle?(request: HttpRequest, model: Readonly<Record<string, unknown>> | null): void | Promise<void>;
  afterCompletion?(request: HttpRequest, error: Error | null): void | Promise<void>;
  afterConcurrentHandlingStarted?(request: HttpRequest): void | Promise<void>;
}

export class WebRequestHandlerInterceptorAdapter implements HandlerInterceptor {
  constructor(private readonly delegate: WebRequestInterceptor) {}

  async preHandle(request: HttpRequest): Promise<boolean> {
    await this.delegate.preHandle?.(request);
    return true;
  }

  async postHandle(
    request: HttpRequest,
    _response: HttpResponse,
    _handler: unknown,
    modelAndView: ModelAndView | null,
  ): Promise<void> {
    const model = modelAndView && !modelAndView.wasCleared() ? modelAndView.model : null;
    await this.delegate.postHandle?.(request, model);
  }

  async afterCompletion(
    request: HttpRequest,
    _response: HttpResponse,
    _handler: unknown,
    error: Error | null,
  ): Promise<void> {
    await this.delegate.afterCompletion?.(request, error);
  }

  async afterConcurrentHandlingStarted(request: HttpRequest): Promise<void> {
    await this.delegate.afterConcurrentHandlingStarted?.(request);
  }
}
