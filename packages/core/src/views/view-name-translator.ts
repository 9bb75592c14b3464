import type { HttpRequest } from "@switchyard/types";
import type { RequestToViewNameTranslator } from "../interfaces";

/** "/accounts/list.html" becomes "accounts/list". */
export function extractViewNameFromPath(path: string): string {
  let name = path.replace(/^\/+/, "").replace(/\/+$/, "");
  const slash = name.lastIndexOf("/");
  const dot = name.lastIndexOf(".");
  if (dot > slash) name = name.slice(0, dot);
  return name;
}

export type ViewNameTranslatorOptions = {
  prefix?: string;
  suffix?: string;
};

/** Derives the view name from the request path. */
export class DefaultRequestToViewNameTranslator implements RequestToViewNameTranslator {
  constructor(private readonly options: ViewNameTranslatorOptions = {}) {}

  getViewName(request: HttpRequest): string | null {
    const name = extractViewNameFromPath(request.path);
    if (!name) return null;
    return `${this.options.prefix ?? ""}${name}${this.options.suffix ?? ""}`;
  }
}
