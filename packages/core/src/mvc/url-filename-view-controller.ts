import type { HttpRequest } from "@switchyard/types";
import type { Controller } from "./controller";
import { ModelAndView } from "../views/model-and-view";
import { extractViewNameFromPath } from "../views/view-name-translator";
import { BEST_MATCHING_PATTERN } from "../handlers/mapping/attributes";
import { getInputFlashAttributes } from "../flash/flash-map-manager";

export type UrlFilenameViewControllerOptions = {
  prefix?: string;
  suffix?: string;
  /** Drop the literal part of the matched pattern, so "/docs/**" serves "/docs/intro" as "intro". */
  stripMappedPrefix?: boolean;
};

/** Renders the view named after the request path, with the flashed attributes as model. */
export class UrlFilenameViewController implements Controller {
  private readonly cache = new Map<string, string>();

  constructor(private readonly options: UrlFilenameViewControllerOptions = {}) {}

  handleRequest(request: HttpRequest): ModelAndView {
    return new ModelAndView(this.getViewName(request), getInputFlashAttributes(request));
  }

  getViewName(request: HttpRequest): string {
    const path = this.getLookupPath(request);
    const cached = this.cache.get(path);
    if (cached !== undefined) return cached;

    const viewName = `${this.options.prefix ?? ""}${extractViewNameFromPath(path)}${this.options.suffix ?? ""}`;
    this.cache.set(path, viewName);
    return viewName;
  }

  private getLookupPath(request: HttpRequest): string {
    const pattern = BEST_MATCHING_PATTERN.get(request);
    if (!this.options.stripMappedPrefix || !pattern) return request.path;

    const literal = pattern.slice(0, pattern.search(/[*?{]|$/)).replace(/\/+$/, "");
    return literal && request.path.startsWith(literal) ? request.path.slice(literal.length) : request.path;
  }
}
