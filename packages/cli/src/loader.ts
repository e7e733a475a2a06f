// ============================================================================
// @armory/cli — Armor database loader
// ============================================================================
// Format: one header line, then `description^cost^defense` per line.

import { readFile } from 'node:fs/promises';
import { DatabaseLoadError, createItem, error, logLoad, warn } from '@armory/core';
import type { Item } from '@armory/core';

export const FIELD_SEPARATOR = '^';

export interface SkippedRecord {
  /** 1-based line number in the file */
  line: number;
  reason: string;
  text: string;
}

export interface ParsedDatabase {
  items: Item[];
  skipped: SkippedRecord[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

function parseNumber(field: string): number | undefined {
  const trimmed = field.trim();
  if (trimmed.length === 0) return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parse database text. Malformed records are collected in `skipped` rather
 * than aborting the whole load.
 */
export function parseArmorDatabase(text: string): ParsedDatabase {
  const items: Item[] = [];
  const skipped: SkippedRecord[] = [];
  const lines = text.split(/\r?\n/);

  // Line 1 is the header
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) continue;

    const lineNumber = i + 1;
    const fields = line.split(FIELD_SEPARATOR);
    if (fields.length !== 3) {
      skipped.push({
        line: lineNumber,
        reason: `expected 3 fields, got ${fields.length}`,
        text: line,
      });
      continue;
    }

    const [description, costField, defenseField] = fields;
    const cost = parseNumber(costField);
    const defense = parseNumber(defenseField);
    if (cost === undefined || defense === undefined) {
      skipped.push({ line: lineNumber, reason: 'cost and defense must be numbers', text: line });
      continue;
    }

    try {
      items.push(createItem(description, cost, defense));
    } catch (err: unknown) {
      skipped.push({ line: lineNumber, reason: errorMessage(err), text: line });
    }
  }

  return { items, skipped };
}

/**
 * Read and parse a database file.
 *
 * @throws DatabaseLoadError when the file cannot be read.
 */
export async function readArmorDatabase(path: string): Promise<ParsedDatabase> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new DatabaseLoadError(path, errorMessage(err));
  }
  return parseArmorDatabase(text);
}

/**
 * Load every valid item from a database file, or `undefined` when the file
 * cannot be read. Skipped records are logged as warnings.
 */
export async function loadArmorDatabase(path: string): Promise<Item[] | undefined> {
  let parsed: ParsedDatabase;
  try {
    parsed = await readArmorDatabase(path);
  } catch (err: unknown) {
    if (!(err instanceof DatabaseLoadError)) throw err;
    error(`Failed to load armor database: ${err.message}`, { path });
    return undefined;
  }

  for (const record of parsed.skipped) {
    warn(`Skipping line ${record.line}: ${record.reason}`, { path, line: record.line });
  }
  logLoad(path, parsed.items.length, parsed.skipped.length);
  return parsed.items;
}
