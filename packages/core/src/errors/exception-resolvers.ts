import type { HttpRequest, HttpResponse } from "@switchyard/types";
import type { HandlerExceptionResolver } from "../interfaces";
import { ModelAndView } from "../views/model-and-view";
import { HttpException } from "./http-exception";

/** Answers {@link HttpException}s with their status and a JSON body. */
export class HttpExceptionResolver implements HandlerExceptionResolver {
  constructor(readonly order?: number) {}

  resolveException(
    _request: HttpRequest,
    response: HttpResponse,
    _handler: unknown,
    error: Error,
  ): ModelAndView | null {
    if (!(error instanceof HttpException)) return null;
    response.status = error.statusCode;
    Object.assign(response.headers, error.headers);
    response.headers["content-type"] = "application/json";
    response.body = JSON.stringify(error.toResponseBody());
    return ModelAndView.empty();
  }
}

export type SimpleMappingExceptionResolverOptions = {
  /** Error class or `name` to view name; superclasses are checked too. */
  exceptionMappings?: Readonly<Record<string, string>>;
  defaultErrorView?: string;
  /** View name to response status. */
  statusCodes?: Readonly<Record<string, number>>;
  defaultStatusCode?: number;
  /** Model key the error is exposed under. */
  exceptionAttribute?: string;
  /** Only resolve errors raised by these handlers. */
  mappedHandlers?: readonly unknown[];
  order?: number;
};

/** Maps errors to error views by class name. */
export class SimpleMappingExceptionResolver implements HandlerExceptionResolver {
  readonly order?: number;

  constructor(private readonly options: SimpleMappingExceptionResolverOptions = {}) {
    this.order = options.order;
  }

  resolveException(
    _request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    error: Error,
  ): ModelAndView | null {
    const mappedHandlers = this.options.mappedHandlers;
    if (mappedHandlers && !mappedHandlers.includes(handler)) return null;

    const viewName = this.determineViewName(error);
    if (!viewName) return null;

    const status = this.options.statusCodes?.[viewName] ?? this.options.defaultStatusCode;
    const modelAndView = new ModelAndView(viewName, {
      [this.options.exceptionAttribute ?? "exception"]: error,
    });
    if (status !== undefined) {
      response.status = status;
      modelAndView.status = status;
    }
    return modelAndView;
  }

  private determineViewName(error: Error): string | null {
    const mappings = this.options.exceptionMappings ?? {};
    for (const name of errorNames(error)) {
      const viewName = mappings[name];
      if (viewName) return viewName;
    }
    return this.options.defaultErrorView ?? null;
  }
}

/** `error.name`, then the class names up the prototype chain. */
function errorNames(error: Error): string[] {
  const names = [error.name];
  let proto: unknown = Object.getPrototypeOf(error);
  while (typeof proto === "object" && proto !== null && proto !== Object.prototype) {
    const ctor: unknown = Reflect.get(proto, "constructor");
    if (typeof ctor === "function" && ctor.name && !names.includes(ctor.name)) names.push(ctor.name);
    proto = Object.getPrototypeOf(proto);
  }
  return names;
}
