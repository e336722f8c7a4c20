/**
 * Ordering for registered extensions (filters, subtree providers, subscribers).
 */
export interface Precedence {
  /** Higher values are preferred; preferred entries come last. Defaults to 0. */
  readonly order?: number;
}

/**
 * Stable ascending sort on `order`, so the preferred extension runs (or wins) last.
 */
export function orderByPrecedence<T extends Precedence>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => (a.item.order ?? 0) - (b.item.order ?? 0) || a.index - b.index)
    .map(entry => entry.item);
}
