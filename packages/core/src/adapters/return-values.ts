import type { HttpRequest } from "@switchyard/types";
import type { View } from "../interfaces";
import { DeferredResult } from "../async/deferred-result";
import { getAsyncManager } from "../async/async-manager";
import { OUTPUT_FLASH_MAP } from "../flash/flash-map-manager";
import type { RedirectAttributes } from "../flash/redirect-attributes";
import { ModelAndView } from "../views/model-and-view";
import { RedirectView } from "../views/redirect-view";
import { isRedirectViewName } from "../views/view-resolvers";

export type ReturnValueOptions = {
  /** Model the handler populated; merged under a view returned by name or instance. */
  model?: Record<string, unknown>;
  redirectAttributes?: RedirectAttributes;
  /** False on the resumed pass, where a second deferred result is not allowed. */
  allowAsync?: boolean;
};

export function isView(value: unknown): value is View {
  return (
    typeof value === "object" &&
    value !== null &&
    "render" in value &&
    typeof value.render === "function"
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Normalizes what a handler returned:
 *
 * - `ModelAndView` as is, topped up with model entries it lacks
 * - a string is a view name, a `View` is rendered directly
 * - a plain object is a model without a view
 * - `null`/`undefined` means the handler wrote the response
 * - a `DeferredResult` starts concurrent handling and yields null
 */
export function resolveReturnValue(
  value: unknown,
  request: HttpRequest,
  options: ReturnValueOptions = {},
): ModelAndView | null {
  const model = options.model ?? {};

  if (value instanceof DeferredResult) {
    if (options.allowAsync === false) {
      throw new TypeError("A deferred result cannot complete with another deferred result");
    }
    getAsyncManager(request).startConcurrentHandling(value, {
      model: options.model,
      redirectAttributes: options.redirectAttributes,
    });
    return null;
  }

  let result: ModelAndView;
  if (value instanceof ModelAndView) {
    result = value;
    for (const [name, attribute] of Object.entries(model)) {
      if (!(name in result.model)) result.addObject(name, attribute);
    }
  } else if (typeof value === "string" || isView(value)) result = new ModelAndView(value, model);
  else if (value === null || value === undefined) return null;
  else if (isPlainObject(value)) result = new ModelAndView(null, { ...model, ...value });
  else throw new TypeError(`Unsupported handler return value of type ${typeof value}`);

  const redirectAttributes = options.redirectAttributes;
  if (redirectAttributes && isRedirect(result)) {
    const output = OUTPUT_FLASH_MAP.get(request);
    for (const [name, attribute] of redirectAttributes.flashAttributes) output?.set(name, attribute);
    return new ModelAndView(result.view, redirectAttributes.attributes, result.status);
  }
  return result;
}

function isRedirect(modelAndView: ModelAndView): boolean {
  return modelAndView.view instanceof RedirectView || isRedirectViewName(modelAndView.viewName);
}
