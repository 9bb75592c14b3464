import type { View, ViewResolver } from "../interfaces";
import { RedirectView, type RedirectViewOptions } from "./redirect-view";

export const REDIRECT_URL_PREFIX = "redirect:";

/** Resolves `redirect:<url>` names to a {@link RedirectView}. */
export class RedirectViewResolver implements ViewResolver {
  constructor(
    private readonly viewOptions: RedirectViewOptions = {},
    readonly order = 0,
  ) {}

  resolveViewName(viewName: string): View | null {
    if (!viewName.startsWith(REDIRECT_URL_PREFIX)) return null;
    return new RedirectView(viewName.slice(REDIRECT_URL_PREFIX.length), this.viewOptions);
  }
}

/**
 * Resolves names from a fixed registry. Locale-specific entries are
 * registered as `name_locale` (e.g. `home_fr`) and preferred when present.
 */
export class StaticViewResolver implements ViewResolver {
  readonly order?: number;
  private readonly views: Map<string, View>;

  constructor(views: Readonly<Record<string, View>> = {}, options: { order?: number } = {}) {
    this.views = new Map(Object.entries(views));
    this.order = options.order;
  }

  addView(name: string, view: View): this {
    this.views.set(name, view);
    return this;
  }

  resolveViewName(viewName: string, locale: string): View | null {
    return this.views.get(`${viewName}_${locale}`) ?? this.views.get(viewName) ?? null;
  }
}

export function isRedirectViewName(viewName: string | null): boolean {
  return viewName !== null && viewName.startsWith(REDIRECT_URL_PREFIX);
}
