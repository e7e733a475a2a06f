// ============================================================================
// @armory/engine — Greedy Solver
// ============================================================================
//
// Repeatedly takes the most cost-efficient item (defense per gold) that still
// fits the remaining budget. Fast, O(n²), but not guaranteed optimal.
//
// ============================================================================

import { efficiency } from '@armory/core';
import type { Item } from '@armory/core';

/**
 * Select items greedily by efficiency within `budget`.
 *
 * Ties on efficiency go to the item found first in the pool; an item that
 * exactly uses up the remaining budget is still eligible. Zero-efficiency
 * items are never chosen. The input array is left untouched.
 *
 * @example
 * ```ts
 * greedySelect([helmet, shield, greaves], 50);
 * // → [helmet, shield]
 * ```
 */
export function greedySelect(items: readonly Item[], budget: number): Item[] {
  const todo = [...items];
  const result: Item[] = [];
  let spent = 0;

  while (todo.length > 0) {
    let bestIndex = -1;
    let bestEfficiency = 0;

    for (let i = 0; i < todo.length; i++) {
      const item = todo[i];
      if (!(spent + item.cost <= budget)) continue;

      const e = efficiency(item);
      if (e > bestEfficiency) {
        bestEfficiency = e;
        bestIndex = i;
      }
    }

    if (bestIndex === -1) break;

    const [chosen] = todo.splice(bestIndex, 1);
    result.push(chosen);
    spent += chosen.cost;
  }

  return result;
}
