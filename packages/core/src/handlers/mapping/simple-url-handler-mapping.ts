import type { HttpRequest } from "@switchyard/types";
import { getPatternComparator, isPattern, matchPath } from "@switchyard/common";
import { AmbiguousMappingError } from "../../errors/dispatch-errors";
import { describeHandler } from "../handler-method";
import { AbstractHandlerMapping, type HandlerMappingOptions } from "./abstract-handler-mapping";

/**
 * Maps URL paths or path patterns straight to handlers. An exact path
 * wins over patterns; among patterns the most specific one wins.
 */
export class SimpleUrlHandlerMapping extends AbstractHandlerMapping {
  private readonly handlerMap = new Map<string, unknown>();

  constructor(urlMap: Readonly<Record<string, unknown>> = {}, options: HandlerMappingOptions = {}) {
    super(options);
    for (const [path, handler] of Object.entries(urlMap)) this.registerHandler(path, handler);
  }

  registerHandler(urlPath: string, handler: unknown): this {
    const path = urlPath.startsWith("/") ? urlPath : `/${urlPath}`;
    const existing = this.handlerMap.get(path);
    if (existing !== undefined && existing !== handler) {
      const handlers = [describeHandler(existing), describeHandler(handler)];
      throw new AmbiguousMappingError(
        `Cannot map ${handlers[1]} to URL path "${path}": ${handlers[0]} is already mapped there`,
        handlers,
      );
    }
    this.handlerMap.set(path, handler);
    return this;
  }

  getHandlerMap(): ReadonlyMap<string, unknown> {
    return this.handlerMap;
  }

  protected async getHandlerInternal(request: HttpRequest): Promise<unknown> {
    const path = request.path;
    const direct = this.lookupExact(path);
    if (direct) {
      this.exposeMatch(direct.pattern, request);
      return direct.handler;
    }

    const options = { trailingSlashMatch: this.trailingSlashMatch };
    const patterns = [...this.handlerMap.keys()]
      .filter((pattern) => isPattern(pattern) && matchPath(pattern, path, options))
      .sort(getPatternComparator(path));

    const best = patterns[0];
    if (best === undefined) return null;
    this.exposeMatch(best, request);
    return this.handlerMap.get(best);
  }

  private lookupExact(path: string): { pattern: string; handler: unknown } | null {
    const handler = this.handlerMap.get(path);
    if (handler !== undefined) return { pattern: path, handler };
    if (this.trailingSlashMatch && path.length > 1 && path.endsWith("/")) {
      const trimmed = path.slice(0, -1);
      const fallback = this.handlerMap.get(trimmed);
      if (fallback !== undefined) return { pattern: trimmed, handler: fallback };
    }
    return null;
  }
}
