import type { Ordered } from "@switchyard/types";

export const LOWEST_PRECEDENCE = Number.MAX_SAFE_INTEGER;

export function getOrder(item: Ordered): number {
  return item.order ?? LOWEST_PRECEDENCE;
}

/**
 * Returns a copy sorted by ascending `order`. Items with equal order keep
 * their registration order.
 */
export function sortByOrder<T extends Ordered>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => getOrder(a.item) - getOrder(b.item) || a.index - b.index)
    .map(({ item }) => item);
}
