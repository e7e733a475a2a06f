// ============================================================================
// @armory/cli — Armor budget optimizer
// ============================================================================
// Commands:
//   armory list       <file>                              → every loaded item
//   armory filter     <file> [--min 1] [--max 2500] [--limit 6]
//   armory greedy     <file> [--budget 500] [filter flags]
//   armory exhaustive <file> [--budget 500] [filter flags]
//   armory compare    <file> [--budget 500] [filter flags]
// ============================================================================

import { ArmoryError, filterItems } from '@armory/core';
import type { Item } from '@armory/core';
import { compareStrategies, solve } from '@armory/engine';
import type { SolveStrategy } from '@armory/engine';
import { resolveConfig } from './config.js';
import type { ArmoryConfig, ConfigFlags } from './config.js';
import { loadArmorDatabase } from './loader.js';
import { formatArmorList, formatComparison, formatSolveResult } from './report.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
}

const consoleIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  env: process.env,
};

export const USAGE = `Usage: armory <command> <file> [options]

Commands:
  list        Print every item in the database
  filter      Print the items kept by the defense filter
  greedy      Pick items greedily by defense per gold
  exhaustive  Search every subset of the filtered items
  compare     Run both solvers and show the difference

Options:
  --budget <gold>   Gold budget (default 500, env ARMORY_BUDGET)
  --min <defense>   Minimum defense kept (default 1, env ARMORY_MIN_DEFENSE)
  --max <defense>   Maximum defense kept (default 2500, env ARMORY_MAX_DEFENSE)
  --limit <count>   Items kept by the filter (default 6, env ARMORY_LIMIT)`;

const COMMANDS = ['list', 'filter', 'greedy', 'exhaustive', 'compare'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function readFlags(args: string[]): ConfigFlags {
  return {
    budget: getFlag(args, 'budget'),
    min: getFlag(args, 'min'),
    max: getFlag(args, 'max'),
    limit: getFlag(args, 'limit'),
  };
}

function filtered(items: Item[], config: ArmoryConfig): Item[] {
  return filterItems(items, config.minDefense, config.maxDefense, config.limit);
}

function render(command: Command, items: Item[], config: ArmoryConfig): string {
  switch (command) {
    case 'list':
      return formatArmorList(items);
    case 'filter':
      return formatArmorList(filtered(items, config));
    case 'compare':
      return formatComparison(compareStrategies(filtered(items, config), config.budget));
    case 'greedy':
    case 'exhaustive': {
      const strategy: SolveStrategy = command;
      return formatSolveResult(solve(filtered(items, config), { budget: config.budget, strategy }));
    }
  }
}

/**
 * Run the CLI and resolve to its exit code.
 */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
  const command = args[0];

  if (command === undefined || command === 'help' || command === '--help') {
    io.stdout(USAGE);
    return 0;
  }
  if (!isCommand(command)) {
    io.stderr(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  const file = args[1];
  if (file === undefined || file.startsWith('--')) {
    io.stderr(`Missing database file for "${command}"`);
    return 1;
  }

  try {
    const config = resolveConfig(readFlags(args), io.env);
    const items = await loadArmorDatabase(file);
    if (items === undefined) {
      io.stderr(`Could not read armor database: ${file}`);
      return 1;
    }
    io.stdout(render(command, items, config));
    return 0;
  } catch (err: unknown) {
    if (err instanceof ArmoryError) {
      io.stderr(`Error: ${errorMessage(err)}`);
      return 1;
    }
    throw err;
  }
}
