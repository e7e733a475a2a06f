// ============================================================================
// @armory/core — Armor Item
// ============================================================================

import { ItemValidationError } from './errors.js';

/**
 * A piece of armor eligible for selection.
 *
 * Items are frozen on construction and shared by reference between the
 * source collection, filtered views and solutions.
 */
export interface Item {
  /** Human-readable description, e.g. "enchanted helmet". Never empty. */
  readonly description: string;
  /** Cost in gold. Always positive. */
  readonly cost: number;
  /** Defense points. Never negative. */
  readonly value: number;
}

/**
 * Build a validated, frozen item.
 *
 * @throws ItemValidationError when the description is empty, the cost is not a
 *   positive finite number, or the value is not a non-negative finite number.
 */
export function createItem(description: string, cost: number, value: number): Item {
  if (description.length === 0) {
    throw new ItemValidationError('description', 'must be non-empty', description);
  }
  if (!Number.isFinite(cost) || cost <= 0) {
    throw new ItemValidationError('cost', 'must be a positive finite number', cost);
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new ItemValidationError('value', 'must be a non-negative finite number', value);
  }
  return Object.freeze({ description, cost, value });
}

/** Value per unit of cost. */
export function efficiency(item: Item): number {
  return item.value / item.cost;
}
