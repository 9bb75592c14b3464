import createDebug from "debug";
import type { HttpRequest } from "@switchyard/types";
import { extractUriTemplateVariables } from "@switchyard/common";
import { readTrailingSlashMatch } from "@switchyard/config";
import type { HandlerInterceptor, HandlerMapping } from "../../interfaces";
import { HandlerExecutionChain } from "../execution-chain";
import { describeHandler } from "../handler-method";
import { MappedInterceptor } from "../interceptors";
import { BEST_MATCHING_PATTERN, URI_TEMPLATE_VARIABLES } from "./attributes";

const debug = createDebug("switchyard:core:mapping");

export type HandlerMappingOptions = {
  order?: number;
  /** Returned when no mapping matches; leave unset to fall through to the next mapping. */
  defaultHandler?: unknown;
  /** Plain interceptors apply to every handler, mapped ones to matching paths. */
  interceptors?: readonly HandlerInterceptor[];
  /** Let "/users/" match "/users". Defaults to `SWITCHYARD_TRAILING_SLASH_MATCH`, else true. */
  trailingSlashMatch?: boolean;
};

/**
 * Base for mappings: looks up a handler, falls back to the default handler
 * and wraps the result in a chain with the interceptors that apply.
 */
export abstract class AbstractHandlerMapping implements HandlerMapping {
  readonly order?: number;
  protected readonly trailingSlashMatch: boolean;
  private readonly defaultHandler: unknown;
  private readonly interceptors: HandlerInterceptor[];

  constructor(options: HandlerMappingOptions = {}) {
    this.order = options.order;
    this.defaultHandler = options.defaultHandler;
    this.interceptors = [...(options.interceptors ?? [])];
    this.trailingSlashMatch = options.trailingSlashMatch ?? readTrailingSlashMatch();
  }

  addInterceptor(interceptor: HandlerInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  async getHandler(request: HttpRequest): Promise<HandlerExecutionChain | null> {
    let handler = await this.getHandlerInternal(request);
    if (handler === null || handler === undefined) handler = this.defaultHandler;
    if (handler === null || handler === undefined) return null;

    debug("%s mapped %s %s to %s", this.constructor.name, request.method, request.path, describeHandler(handler));
    return this.getHandlerExecutionChain(handler, request);
  }

  /** Resolves to null or undefined when this mapping has no handler. */
  protected abstract getHandlerInternal(request: HttpRequest): Promise<unknown>;

  protected getHandlerExecutionChain(handler: unknown, request: HttpRequest): HandlerExecutionChain {
    const chain = new HandlerExecutionChain(handler);
    for (const interceptor of this.interceptors) {
      if (interceptor instanceof MappedInterceptor) {
        if (interceptor.matches(request.path)) chain.addInterceptor(interceptor.interceptor);
      } else {
        chain.addInterceptor(interceptor);
      }
    }
    return chain;
  }

  /** Records the winning pattern and its template variables on the request. */
  protected exposeMatch(pattern: string, request: HttpRequest): void {
    BEST_MATCHING_PATTERN.set(request, pattern);
    URI_TEMPLATE_VARIABLES.set(
      request,
      extractUriTemplateVariables(pattern, request.path, {
        trailingSlashMatch: this.trailingSlashMatch,
      }) ?? {},
    );
  }
}
