import type { HttpRequest } from "@switchyard/types";
import { getPatternComparator, joinHandlerPath, matchPath } from "@switchyard/common";
import { AbstractRequestCondition, uniqueExpressions } from "./request-condition";

export type PatternsConditionOptions = {
  trailingSlashMatch?: boolean;
};

/**
 * URL path patterns, any of which may match. Combining joins each pattern
 * of this condition with each of the other's, so a type-level "/accounts"
 * and a method-level "/{id}" give "/accounts/{id}".
 */
export class PatternsRequestCondition extends AbstractRequestCondition<PatternsRequestCondition> {
  readonly patterns: readonly string[];
  private readonly options: PatternsConditionOptions;

  constructor(patterns: readonly string[] = [], options: PatternsConditionOptions = {}) {
    super();
    this.patterns = uniqueExpressions(
      patterns.map((p) => (p && !p.startsWith("/") ? `/${p}` : p)),
    );
    this.options = options;
  }

  getContent(): readonly string[] {
    return this.patterns;
  }

  protected getToStringInfix(): string {
    return " || ";
  }

  combine(other: PatternsRequestCondition): PatternsRequestCondition {
    if (this.isEmpty()) return new PatternsRequestCondition(other.patterns, this.options);
    if (other.isEmpty()) return this;
    const joined: string[] = [];
    for (const prefix of this.patterns) {
      for (const suffix of other.patterns) joined.push(joinHandlerPath(prefix, suffix));
    }
    return new PatternsRequestCondition(joined, this.options);
  }

  /** Keeps the matching patterns, most specific first. */
  getMatchingCondition(request: HttpRequest): PatternsRequestCondition | null {
    if (this.isEmpty()) return this;
    const matches = this.getMatchingPatterns(request.path);
    return matches.length > 0 ? new PatternsRequestCondition(matches, this.options) : null;
  }

  getMatchingPatterns(path: string): string[] {
    return this.patterns
      .filter((pattern) => pattern === path || matchPath(pattern, path, this.options))
      .sort(getPatternComparator(path));
  }

  /** Compares pattern by pattern; with equal prefixes more patterns win. */
  compareTo(other: PatternsRequestCondition, request: HttpRequest): number {
    const comparator = getPatternComparator(request.path);
    const count = Math.min(this.patterns.length, other.patterns.length);
    for (let i = 0; i < count; i++) {
      const result = comparator(this.patterns[i] ?? "", other.patterns[i] ?? "");
      if (result !== 0) return result;
    }
    return other.patterns.length - this.patterns.length;
  }
}
