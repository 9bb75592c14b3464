import type { HttpRequest } from "@switchyard/types";
import type { LocaleResolver } from "../interfaces";
import { getHeader } from "../dispatch/http-utils";

export type AcceptHeaderLocaleResolverOptions = {
  defaultLocale?: string;
  /** When set, only these locales (or their language) are returned. */
  supportedLocales?: readonly string[];
};

type WeightedLocale = { tag: string; quality: number };

function parseAcceptLanguage(header: string): string[] {
  const weighted: WeightedLocale[] = [];
  for (const part of header.split(",")) {
    const [tag = "", ...params] = part.split(";").map((p) => p.trim());
    if (!tag || tag === "*") continue;
    const q = params.find((p) => p.startsWith("q="));
    const quality = q ? Number.parseFloat(q.slice(2)) : 1;
    if (Number.isNaN(quality) || quality <= 0) continue;
    weighted.push({ tag, quality });
  }
  return weighted.sort((a, b) => b.quality - a.quality).map((w) => w.tag);
}

function language(tag: string): string {
  return tag.split("-")[0]?.toLowerCase() ?? tag.toLowerCase();
}

/** Picks the locale from the `accept-language` header. */
export class AcceptHeaderLocaleResolver implements LocaleResolver {
  private readonly defaultLocale: string;
  private readonly supportedLocales: readonly string[];

  constructor(options: AcceptHeaderLocaleResolverOptions = {}) {
    this.defaultLocale = options.defaultLocale ?? "en";
    this.supportedLocales = options.supportedLocales ?? [];
  }

  resolveLocale(request: HttpRequest): string {
    const header = getHeader(request, "accept-language");
    if (!header) return this.defaultLocale;

    const requested = parseAcceptLanguage(header);
    if (this.supportedLocales.length === 0) return requested[0] ?? this.defaultLocale;

    for (const tag of requested) {
      const exact = this.supportedLocales.find((l) => l.toLowerCase() === tag.toLowerCase());
      if (exact) return exact;
    }
    for (const tag of requested) {
      const byLanguage = this.supportedLocales.find((l) => language(l) === language(tag));
      if (byLanguage) return byLanguage;
    }
    return this.defaultLocale;
  }
}

export class FixedLocaleResolver implements LocaleResolver {
  constructor(private readonly locale: string) {}

  resolveLocale(): string {
    return this.locale;
  }
}
