import type { HttpRequest, HttpResponse, SwitchyardLogger } from "@switchyard/types";
import type { RedirectAttributes } from "../flash/redirect-attributes";

/** What a handler method receives when invoked. */
export type HandlerMethodContext = {
  request: HttpRequest;
  response: HttpResponse;
  /** Starts out holding the attributes flashed to this request. */
  model: Record<string, unknown>;
  pathVariables: Readonly<Record<string, string>>;
  redirectAttributes: RedirectAttributes;
  logger: SwitchyardLogger;
};

/** A method on a controller object, invoked with a {@link HandlerMethodContext}. */
export class HandlerMethod {
  readonly bean: object;
  readonly methodName: string;
  private readonly invoker: (context: HandlerMethodContext) => unknown;

  constructor(bean: object, methodName: string) {
    const candidate: unknown = Reflect.get(bean, methodName);
    if (typeof candidate !== "function") {
      throw new TypeError(`${bean.constructor.name}#${methodName} is not a method`);
    }
    this.bean = bean;
    this.methodName = methodName;
    this.invoker = (context) => Reflect.apply(candidate, bean, [context]);
  }

  get beanName(): string {
    return this.bean.constructor.name;
  }

  invoke(context: HandlerMethodContext): unknown {
    return this.invoker(context);
  }

  toString(): string {
    return `${this.beanName}#${this.methodName}`;
  }
}

export function describeHandler(handler: unknown): string {
  if (handler instanceof HandlerMethod) return handler.toString();
  if (typeof handler === "function") return handler.name || "anonymous function";
  if (typeof handler === "object" && handler !== null) return handler.constructor.name;
  return String(handler);
}
