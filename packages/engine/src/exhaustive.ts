// ============================================================================
// @armory/engine — Exhaustive Solver
// ============================================================================
//
// Enumerates every subset of the input with a 64-bit mask (bit j = item j)
// and keeps the feasible subset of greatest total defense. Exact, but
// O(2^n · n): filter the collection down before calling it.
//
// ============================================================================

import { SubsetLimitExceededError, sumItems } from '@armory/core';
import type { Item } from '@armory/core';

/** Largest input the 64-bit subset mask can enumerate. */
export const MAX_EXHAUSTIVE_ITEMS = 63;

/**
 * Find the subset of `items` with maximum total value whose cost fits `budget`.
 *
 * Subsets are visited in mask order and a later subset only replaces the best
 * one when its value is strictly greater, so among equal-value optima the one
 * with the lowest mask wins. The empty subset is the starting best, which
 * makes an empty result the answer when nothing else fits.
 *
 * @throws SubsetLimitExceededError when `items.length > MAX_EXHAUSTIVE_ITEMS`.
 */
export function exhaustiveSelect(items: readonly Item[], budget: number): Item[] {
  const n = items.length;
  if (n > MAX_EXHAUSTIVE_ITEMS) {
    throw new SubsetLimitExceededError(n, MAX_EXHAUSTIVE_ITEMS);
  }

  const bits = Array.from({ length: n }, (_, j) => 1n << BigInt(j));
  const end = 1n << BigInt(n);

  let best: Item[] = [];
  let bestValue = 0;

  for (let mask = 1n; mask < end; mask++) {
    const candidate: Item[] = [];
    for (let j = 0; j < n; j++) {
      if ((mask & bits[j]) !== 0n) candidate.push(items[j]);
    }

    const { totalCost, totalValue } = sumItems(candidate);
    if (totalCost <= budget && totalValue > bestValue) {
      best = candidate;
      bestValue = totalValue;
    }
  }

  return best;
}
