// ============================================================================
// @armory/engine — Strategy dispatch
// ============================================================================

import { logSolve, sumItems, timer } from '@armory/core';
import type { Item } from '@armory/core';
import { exhaustiveSelect } from './exhaustive.js';
import { greedySelect } from './greedy.js';

// ── Types ───────────────────────────────────────────────────────────────────

export type SolveStrategy = 'greedy' | 'exhaustive';

export interface SolveConfig {
  /** Maximum total gold the selection may cost */
  budget: number;
  /** Which solver to run */
  strategy: SolveStrategy;
}

export interface SolveResult {
  strategy: SolveStrategy;
  /** Selected items, in the order the solver picked them */
  items: Item[];
  totalCost: number;
  totalValue: number;
  /** Budget spent, in percent with one decimal */
  utilization: number;
  /** Wall time spent inside the solver */
  durationMs: number;
}

export interface StrategyComparison {
  greedy: SolveResult;
  exhaustive: SolveResult;
  /** How much defense the greedy heuristic left on the table */
  valueGap: number;
}

// ── Main API ────────────────────────────────────────────────────────────────

const SOLVERS: Record<SolveStrategy, (items: readonly Item[], budget: number) => Item[]> = {
  greedy: greedySelect,
  exhaustive: exhaustiveSelect,
};

/**
 * Run one solver and report totals and timing.
 *
 * @example
 * ```ts
 * const result = solve(filterItems(all, 1, 2500, 6), { budget: 500, strategy: 'exhaustive' });
 * console.log(result.totalValue, result.durationMs);
 * ```
 */
export function solve(items: readonly Item[], config: SolveConfig): SolveResult {
  const t = timer(`${config.strategy} solver`);
  const selected = SOLVERS[config.strategy](items, config.budget);
  const durationMs = t.end();

  const { totalCost, totalValue } = sumItems(selected);
  logSolve(config.strategy, items.length, selected.length, totalValue, durationMs);

  return {
    strategy: config.strategy,
    items: selected,
    totalCost,
    totalValue,
    utilization: config.budget > 0 ? Math.round((totalCost / config.budget) * 1000) / 10 : 0,
    durationMs,
  };
}

/**
 * Run both solvers on the same input.
 */
export function compareStrategies(items: readonly Item[], budget: number): StrategyComparison {
  const greedy = solve(items, { budget, strategy: 'greedy' });
  const exhaustive = solve(items, { budget, strategy: 'exhaustive' });
  return {
    greedy,
    exhaustive,
    valueGap: exhaustive.totalValue - greedy.totalValue,
  };
}
