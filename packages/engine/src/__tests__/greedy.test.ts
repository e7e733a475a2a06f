// ============================================================================
// Greedy Solver — Tests
// ============================================================================

import { createItem, sumItems } from '@armory/core';
import { describe, expect, it } from 'vitest';
import { greedySelect } from '../greedy.js';

const a = createItem('A', 10, 60);
const b = createItem('B', 20, 100);
const c = createItem('C', 30, 120);

describe('greedySelect', () => {
  it('picks by efficiency until nothing else fits', () => {
    // efficiencies A=6, B=5, C=4; after A and B only 20 gold remain
    expect(greedySelect([c, b, a], 50)).toEqual([a, b]);
  });

  it('returns items in the order they were picked', () => {
    const cheap = createItem('cheap', 1, 10);
    expect(greedySelect([c, cheap, a], 100)).toEqual([cheap, a, c]);
  });

  it('breaks efficiency ties by first occurrence', () => {
    const x = createItem('X', 10, 50);
    const y = createItem('Y', 20, 100);
    expect(greedySelect([x, y], 20)).toEqual([x]);
    expect(greedySelect([y, x], 20)).toEqual([y]);
  });

  it('takes an item whose cost equals the remaining budget', () => {
    expect(greedySelect([a, b], 30)).toEqual([a, b]);
  });

  it('skips items that do not fit and keeps looking', () => {
    const pricey = createItem('pricey', 45, 900);
    expect(greedySelect([pricey, a, b], 40)).toEqual([a, b]);
  });

  it('never selects zero-defense items', () => {
    const rag = createItem('rag', 1, 0);
    expect(greedySelect([rag], 10)).toEqual([]);
    expect(greedySelect([rag, a], 100)).toEqual([a]);
  });

  it('selects duplicates of the same item independently', () => {
    expect(greedySelect([a, a], 20)).toEqual([a, a]);
  });

  it('returns an empty solution for a zero or negative budget', () => {
    expect(greedySelect([a, b, c], 0)).toEqual([]);
    expect(greedySelect([a, b, c], -5)).toEqual([]);
  });

  it('selects nothing when the budget is not a number', () => {
    expect(greedySelect([a, b], Number.NaN)).toEqual([]);
  });

  it('returns an empty solution for empty input', () => {
    expect(greedySelect([], 100)).toEqual([]);
  });

  it('returns the single item when the budget equals its cost', () => {
    expect(greedySelect([c], 30)).toEqual([c]);
  });

  it('does not modify the input', () => {
    const input = Object.freeze([c, b, a]);
    greedySelect(input, 50);
    expect(input).toEqual([c, b, a]);
  });

  it('stays within budget', () => {
    const picked = greedySelect([a, b, c], 55);
    expect(sumItems(picked).totalCost).toBeLessThanOrEqual(55);
  });
});
