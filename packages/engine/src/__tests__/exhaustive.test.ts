// ============================================================================
// Exhaustive Solver — Tests
// ============================================================================

import { SubsetLimitExceededError, createItem, sumItems } from '@armory/core';
import type { Item } from '@armory/core';
import { describe, expect, it } from 'vitest';
import { MAX_EXHAUSTIVE_ITEMS, exhaustiveSelect } from '../exhaustive.js';

const a = createItem('A', 10, 60);
const b = createItem('B', 20, 100);
const c = createItem('C', 30, 120);

function manyItems(count: number): Item[] {
  return Array.from({ length: count }, (_, i) => createItem(`plate ${i}`, 1 + i, 10));
}

describe('exhaustiveSelect', () => {
  it('finds the exact optimum', () => {
    // {A,B,C} costs 60; best feasible is {B,C}: cost 50, defense 220
    expect(exhaustiveSelect([a, b, c], 50)).toEqual([b, c]);
  });

  it('keeps selected items in input order', () => {
    expect(exhaustiveSelect([c, a, b], 50)).toEqual([c, b]);
  });

  it('keeps the first subset found among equal-value optima', () => {
    const p = createItem('P', 10, 50);
    const q = createItem('Q', 10, 50);
    expect(exhaustiveSelect([p, q], 10)).toEqual([p]);

    // mask 3 {R,S} reaches 50 before mask 4 {T}
    const r = createItem('R', 5, 30);
    const s = createItem('S', 5, 20);
    const t = createItem('T', 10, 50);
    expect(exhaustiveSelect([r, s, t], 10)).toEqual([r, s]);
  });

  it('returns an empty solution when nothing fits', () => {
    expect(exhaustiveSelect([a, b, c], 5)).toEqual([]);
  });

  it('returns an empty solution for a zero budget', () => {
    expect(exhaustiveSelect([a, b, c], 0)).toEqual([]);
  });

  it('returns an empty solution for empty input', () => {
    expect(exhaustiveSelect([], 100)).toEqual([]);
  });

  it('returns the single item when the budget equals its cost', () => {
    expect(exhaustiveSelect([c], 30)).toEqual([c]);
  });

  it('prefers the empty subset over zero-defense items', () => {
    const rag = createItem('rag', 1, 0);
    expect(exhaustiveSelect([rag], 10)).toEqual([]);
  });

  it('does not modify the input', () => {
    const input = Object.freeze([c, b, a]);
    const picked = exhaustiveSelect(input, 50);
    expect(input).toEqual([c, b, a]);
    expect(sumItems(picked)).toEqual({ totalCost: 50, totalValue: 220 });
  });

  it('handles a dozen items', () => {
    const items = Array.from({ length: 12 }, (_, i) => createItem(`piece ${i}`, 10, i));
    const picked = exhaustiveSelect(items, 30);
    expect(picked.map((item) => item.description)).toEqual(['piece 9', 'piece 10', 'piece 11']);
  });

  describe('input size limit', () => {
    it('allows up to 63 items', () => {
      expect(MAX_EXHAUSTIVE_ITEMS).toBe(63);
    });

    it('rejects 64 items before searching', () => {
      expect(() => exhaustiveSelect(manyItems(64), 100)).toThrow(SubsetLimitExceededError);
    });

    it('reports the offending size', () => {
      try {
        exhaustiveSelect(manyItems(100), 100);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(SubsetLimitExceededError);
        if (err instanceof SubsetLimitExceededError) {
          expect(err.itemCount).toBe(100);
          expect(err.maxItems).toBe(63);
        }
      }
    });
  });
});
