// ============================================================================
// @armory/cli — Console report formatting
// ============================================================================

import { sumItems } from '@armory/core';
import type { Item } from '@armory/core';
import type { SolveResult, StrategyComparison } from '@armory/engine';

/**
 * Render an item list with its grand totals.
 */
export function formatArmorList(items: readonly Item[]): string {
  const lines = ['*** Armor Vector ***'];

  if (items.length === 0) {
    lines.push('[empty armor list]');
    return lines.join('\n');
  }

  for (const item of items) {
    lines.push(
      `Ye olde ${item.description} ==> Cost of ${item.cost} gold; Defense points = ${item.value}`,
    );
  }

  const { totalCost, totalValue } = sumItems(items);
  lines.push(`> Grand total cost: ${totalCost} gold`);
  lines.push(`> Grand total defense: ${totalValue}`);
  return lines.join('\n');
}

export function formatSolveResult(result: SolveResult): string {
  return [
    `Strategy: ${result.strategy}`,
    formatArmorList(result.items),
    `Elapsed: ${result.durationMs.toFixed(3)} ms`,
  ].join('\n');
}

export function formatComparison(comparison: StrategyComparison): string {
  return [
    formatSolveResult(comparison.greedy),
    '',
    formatSolveResult(comparison.exhaustive),
    '',
    `Greedy shortfall: ${comparison.valueGap} defense`,
  ].join('\n');
}
