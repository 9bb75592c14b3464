import type { Comparator } from "@switchyard/types";

/**
 * Joins a handler class prefix with a method-level path.
 * Both use the `{param}` format for template variables.
 *
 * @example
 * joinHandlerPath("/orders", "/{orderId}") => "/orders/{orderId}"
 * joinHandlerPath("/", "/health") => "/health"
 * joinHandlerPath("/api/v1", "/users") => "/api/v1/users"
 */
export function joinHandlerPath(prefix: string, methodPath: string): string {
  const base = prefix || "";
  const path = `/${base}/${methodPath}`.replaceAll(/\/+/g, "/").replace(/\/$/, "") || "/";
  return path;
}

export type PathMatchOptions = {
  /** Let "/users/" match a pattern declared as "/users". Defaults to true. */
  trailingSlashMatch?: boolean;
};

/** True when the path contains `*`, `?` or a `{variable}`. */
export function isPattern(path: string): boolean {
  return /[*?{]/.test(path);
}

/**
 * Matches a request path against a pattern.
 *
 * - `?` matches one character within a segment
 * - `*` matches zero or more characters within a segment
 * - `**` matches zero or more whole segments
 * - `{name}` captures one segment, `{name:regex}` captures what the regex accepts
 */
export function matchPath(pattern: string, path: string, options: PathMatchOptions = {}): boolean {
  return extractUriTemplateVariables(pattern, path, options) !== null;
}

/**
 * Returns the template variables captured when `path` matches `pattern`,
 * or null when it does not match. Captured values are URL-decoded.
 */
export function extractUriTemplateVariables(
  pattern: string,
  path: string,
  options: PathMatchOptions = {},
): Record<string, string> | null {
  const trailingSlashMatch = options.trailingSlashMatch ?? true;
  if (!trailingSlashMatch && path.length > 1 && path.endsWith("/") && !pattern.endsWith("/")) {
    return null;
  }

  const patternParts = splitPath(pattern);
  const pathParts = splitPath(path);
  return matchFrom(patternParts, 0, pathParts, 0);
}

function splitPath(path: string): string[] {
  return path.split("/").filter(Boolean);
}

function matchFrom(
  patternParts: string[],
  p: number,
  pathParts: string[],
  s: number,
): Record<string, string> | null {
  if (p === patternParts.length) {
    return s === pathParts.length ? {} : null;
  }

  const part = patternParts[p];
  if (part === undefined) return null;

  if (part === "**") {
    for (let next = s; next <= pathParts.length; next++) {
      const rest = matchFrom(patternParts, p + 1, pathParts, next);
      if (rest) return rest;
    }
    return null;
  }

  const segment = pathParts[s];
  if (segment === undefined) return null;

  const captured = matchSegment(part, segment);
  if (!captured) return null;

  const rest = matchFrom(patternParts, p + 1, pathParts, s + 1);
  return rest ? { ...captured, ...rest } : null;
}

type CompiledSegment = { regex: RegExp; names: string[] };

const segmentCache = new Map<string, CompiledSegment>();

function compileSegment(part: string): CompiledSegment {
  const cached = segmentCache.get(part);
  if (cached) return cached;

  const names: string[] = [];
  let source = "";
  let i = 0;
  while (i < part.length) {
    const ch = part.charAt(i);
    if (ch === "{") {
      const end = findClosingBrace(part, i);
      const body = part.slice(i + 1, end);
      const colon = body.indexOf(":");
      if (colon === -1) {
        names.push(body);
        source += "(.+?)";
      } else {
        names.push(body.slice(0, colon));
        source += `(${body.slice(colon + 1)})`;
      }
      i = end + 1;
      continue;
    }
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[.+^$()|[\]\\]/g, "\\$&");
    i++;
  }

  const compiled = { regex: new RegExp(`^${source}$`), names };
  segmentCache.set(part, compiled);
  return compiled;
}

function findClosingBrace(part: string, open: number): number {
  let depth = 0;
  for (let i = open; i < part.length; i++) {
    const ch = part.charAt(i);
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  throw new Error(`Unbalanced "{" in path pattern segment "${part}"`);
}

function matchSegment(part: string, segment: string): Record<string, string> | null {
  if (!isPattern(part)) {
    return part === segment ? {} : null;
  }

  const { regex, names } = compileSegment(part);
  const match = regex.exec(segment);
  if (!match) return null;

  const variables: Record<string, string> = {};
  names.forEach((name, index) => {
    const value = match[index + 1];
    if (value !== undefined) variables[name] = decodeSegment(value);
  });
  return variables;
}

function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escape sequence: keep the raw text.
    return value;
  }
}

type PatternInfo = {
  uriVars: number;
  singleWildcards: number;
  doubleWildcards: number;
  length: number;
  catchAll: boolean;
};

function describePattern(pattern: string): PatternInfo {
  const doubleWildcards = (pattern.match(/\*\*/g) ?? []).length;
  const allStars = (pattern.match(/\*/g) ?? []).length;
  return {
    uriVars: (pattern.match(/\{[^}]*\}/g) ?? []).length,
    singleWildcards: allStars - doubleWildcards * 2,
    doubleWildcards,
    length: pattern.replaceAll(/\{[^}]*\}/g, "#").length,
    catchAll: pattern === "/**",
  };
}

/**
 * Orders patterns that all match `path` from most to least specific:
 * the literal path first, the catch-all `/**` last, otherwise fewer
 * wildcards and template variables and then the longer pattern win.
 */
export function getPatternComparator(path: string): Comparator<string> {
  return (a, b) => {
    if (a === b) return 0;
    if (a === path) return -1;
    if (b === path) return 1;

    const infoA = describePattern(a);
    const infoB = describePattern(b);

    if (infoA.catchAll !== infoB.catchAll) return infoA.catchAll ? 1 : -1;

    const totalA = infoA.uriVars + infoA.singleWildcards + 2 * infoA.doubleWildcards;
    const totalB = infoB.uriVars + infoB.singleWildcards + 2 * infoB.doubleWildcards;
    if (totalA !== totalB) return totalA - totalB;

    if (infoA.length !== infoB.length) return infoB.length - infoA.length;
    if (infoA.singleWildcards !== infoB.singleWildcards) {
      return infoA.singleWildcards - infoB.singleWildcards;
    }
    return infoA.uriVars - infoB.uriVars;
  };
}
