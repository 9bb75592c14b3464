import type { HttpRequest, HttpResponse } from "@switchyard/types";
import type { HandlerAdapter } from "../interfaces";
import type { ModelAndView } from "../views/model-and-view";
import { resolveReturnValue } from "./return-values";

/** A bare function serving requests. */
export type FunctionHandler = (request: HttpRequest, response: HttpResponse) => unknown;

function isFunctionHandler(handler: unknown): handler is FunctionHandler {
  return typeof handler === "function";
}

export class FunctionHandlerAdapter implements HandlerAdapter {
  constructor(readonly order?: number) {}

  supports(handler: unknown): boolean {
    return isFunctionHandler(handler);
  }

  async handle(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): Promise<ModelAndView | null> {
    if (!isFunctionHandler(handler)) {
      throw new TypeError("FunctionHandlerAdapter received a handler it does not support");
    }
    return resolveReturnValue(await handler(request, response), request);
  }

  getLastModified(): number {
    return -1;
  }
}
