// ============================================================================
// @armory/core — Collection utilities
// ============================================================================

import type { Item } from './item.js';

export interface ItemTotals {
  totalCost: number;
  totalValue: number;
}

/**
 * Total cost and value of a collection. Empty collections sum to zero.
 */
export function sumItems(items: readonly Item[]): ItemTotals {
  let totalCost = 0;
  let totalValue = 0;
  for (const item of items) {
    totalCost += item.cost;
    totalValue += item.value;
  }
  return { totalCost, totalValue };
}

/**
 * Take the first `limit` items whose value lies in `[minValue, maxValue]`.
 *
 * This truncates in source order; it is not a best-N selection. Used to drop
 * worthless items and to bound the input of the exhaustive solver.
 */
export function filterItems(
  source: readonly Item[],
  minValue: number,
  maxValue: number,
  limit: number,
): Item[] {
  const filtered: Item[] = [];
  if (limit <= 0) return filtered;

  for (const item of source) {
    if (item.value >= minValue && item.value <= maxValue) {
      filtered.push(item);
      if (filtered.length >= limit) break;
    }
  }
  return filtered;
}
