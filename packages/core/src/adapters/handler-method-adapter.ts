import type { HttpRequest, HttpResponse } from "@switchyard/types";
import { currentLogger } from "@switchyard/telemetry";
import type { HandlerAdapter } from "../interfaces";
import type { ModelAndView } from "../views/model-and-view";
import { HandlerMethod } from "../handlers/handler-method";
import { URI_TEMPLATE_VARIABLES } from "../handlers/mapping/attributes";
import { getInputFlashAttributes } from "../flash/flash-map-manager";
import { RedirectAttributes } from "../flash/redirect-attributes";
import { resolveReturnValue } from "./return-values";

/**
 * Invokes {@link HandlerMethod}s. The model starts out with the attributes
 * flashed to the request; on a redirect only the handler's redirect
 * attributes travel on, as query parameters and flash attributes.
 */
export class HandlerMethodAdapter implements HandlerAdapter {
  constructor(readonly order?: number) {}

  supports(handler: unknown): boolean {
    return handler instanceof HandlerMethod;
  }

  async handle(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
  ): Promise<ModelAndView | null> {
    if (!(handler instanceof HandlerMethod)) {
      throw new TypeError("HandlerMethodAdapter received a handler it does not support");
    }

    const model = getInputFlashAttributes(request);
    const redirectAttributes = new RedirectAttributes();
    const value = await handler.invoke({
      request,
      response,
      model,
      pathVariables: URI_TEMPLATE_VARIABLES.get(request) ?? {},
      redirectAttributes,
      logger: currentLogger(),
    });
    return resolveReturnValue(value, request, { model, redirectAttributes });
  }

  getLastModified(): number {
    return -1;
  }
}
