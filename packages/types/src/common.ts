/**
 * Components that take part in a priority-ordered list (handler mappings,
 * adapters, resolvers). Lower values run first; an unset order sorts last.
 */
export interface Ordered {
  readonly order?: number;
}

export type Comparator<T> = (a: T, b: T) => number;
