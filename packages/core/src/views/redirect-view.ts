import type { HttpRequest, HttpResponse } from "@switchyard/types";
import type { View } from "../interfaces";
import { FLASH_MAP_MANAGER } from "../flash/flash-map-manager";
import { URI_TEMPLATE_VARIABLES } from "../handlers/mapping/attributes";
import { sendRedirect } from "../dispatch/http-utils";

export type RedirectViewOptions = {
  statusCode?: 301 | 302 | 303 | 307 | 308;
  /** Append simple model values as query parameters. Defaults to true. */
  exposeModelAttributes?: boolean;
};

function isSimpleValue(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Redirects to a URL. `{name}` placeholders expand from the model, then
 * from the current request's template variables. Pending flash attributes
 * are saved for the redirect target before the response is written.
 */
export class RedirectView implements View {
  constructor(
    readonly url: string,
    private readonly options: RedirectViewOptions = {},
  ) {}

  async render(
    model: Readonly<Record<string, unknown>>,
    request: HttpRequest,
    response: HttpResponse,
  ): Promise<void> {
    const location = this.createTargetUrl(model, request);
    const manager = FLASH_MAP_MANAGER.get(request);
    if (manager) await manager.saveForRedirect(request, response, location);
    sendRedirect(response, location, this.options.statusCode ?? 302);
  }

  createTargetUrl(model: Readonly<Record<string, unknown>>, request: HttpRequest): string {
    const uriVariables = URI_TEMPLATE_VARIABLES.get(request) ?? {};
    const used = new Set<string>();

    let target = this.url.replaceAll(/\{([^}/]+)\}/g, (placeholder, name: string) => {
      const value = model[name];
      if (isSimpleValue(value)) {
        used.add(name);
        return encodeURIComponent(String(value));
      }
      const fromPath = uriVariables[name];
      return fromPath !== undefined ? encodeURIComponent(fromPath) : placeholder;
    });

    if (this.options.exposeModelAttributes ?? true) {
      const query = new URLSearchParams();
      for (const [name, value] of Object.entries(model)) {
        if (!used.has(name) && isSimpleValue(value)) query.append(name, String(value));
      }
      const queryString = query.toString();
      if (queryString) {
        const hash = target.indexOf("#");
        const fragment = hash === -1 ? "" : target.slice(hash);
        const base = hash === -1 ? target : target.slice(0, hash);
        target = `${base}${base.includes("?") ? "&" : "?"}${queryString}${fragment}`;
      }
    }
    return target;
  }
}
