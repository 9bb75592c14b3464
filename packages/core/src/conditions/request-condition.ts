import type { HttpRequest } from "@switchyard/types";

/**
 * A composable predicate over requests. Conditions of one kind combine
 * (type-level with method-level declarations), narrow themselves to what a
 * request satisfied and order by specificity for that request.
 */
export interface RequestCondition<T> {
  combine(other: T): T;

  /** Null when the request does not satisfy the condition. */
  getMatchingCondition(request: HttpRequest): T | null;

  /** Negative when this is the more specific match for the request. */
  compareTo(other: T, request: HttpRequest): number;
}

type Expression = { toString(): string };

export abstract class AbstractRequestCondition<T extends AbstractRequestCondition<T>>
  implements RequestCondition<T>
{
  abstract combine(other: T): T;
  abstract getMatchingCondition(request: HttpRequest): T | null;

  /** The discrete expressions this condition holds. */
  abstract getContent(): readonly Expression[];

  protected abstract getToStringInfix(): string;

  get size(): number {
    return this.getContent().length;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /** More expressions is more specific. */
  compareTo(other: T, _request: HttpRequest): number {
    return other.size - this.size;
  }

  /** Same kind holding the same expressions, in any order. */
  equals(other: unknown): boolean {
    if (!(other instanceof AbstractRequestCondition) || other.constructor !== this.constructor) {
      return false;
    }
    const mine = this.getContent().map(String).sort();
    const theirs = other.getContent().map(String).sort();
    return mine.length === theirs.length && mine.every((value, i) => value === theirs[i]);
  }

  toString(): string {
    return `[${this.getContent().map(String).join(this.getToStringInfix())}]`;
  }
}

/** Drops later expressions that print the same as an earlier one. */
export function uniqueExpressions<E extends Expression>(expressions: Iterable<E>): E[] {
  const seen = new Set<string>();
  const result: E[] = [];
  for (const expression of expressions) {
    const key = String(expression);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(expression);
  }
  return result;
}
