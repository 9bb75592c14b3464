import type { HttpRequest, HttpResponse } from "@switchyard/types";
import type { HandlerAdapter } from "../interfaces";
import type { ModelAndView } from "../views/model-and-view";
import { isController } from "../mvc/controller";
import { resolveReturnValue } from "./return-values";

export class ControllerHandlerAdapter implements HandlerAdapter {
  constructor(readonly order?: number) {}

  supports(handler: unknown): boolean {
    return isController(handler);
  }

  async handle(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): Promise<ModelAndView | null> {
    if (!isController(handler)) {
      throw new TypeError("ControllerHandlerAdapter received a handler it does not support");
    }
    return resolveReturnValue(await handler.handleRequest(request, response), request);
  }

  getLastModified(request: HttpRequest, handler: unknown): number {
    if (!isController(handler) || !handler.getLastModified) return -1;
    return handler.getLastModified(request);
  }
}
