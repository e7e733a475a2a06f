import { fileURLToPath } from 'node:url';
import { SubsetLimitExceededError, createItem, error, filterItems, info } from '@armory/core';
import type { Item } from '@armory/core';
import { compareStrategies, solve } from '@armory/engine';
import type { SolveResult } from '@armory/engine';
import { serve } from '@hono/node-server';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { z } from 'zod';

// ============================================================================
// @armory/server — REST API
// ============================================================================
//
// Stateless: every request carries its own items and budget.
// ============================================================================

export const app = new Hono();

/** Largest collection a request may hand to the exhaustive solver (2^20 subsets). */
export const MAX_REQUEST_EXHAUSTIVE_ITEMS = 20;

// --- Error handling ---
app.onError((err, c) => {
  if (err instanceof SubsetLimitExceededError) {
    return c.json({ error: { code: 'SUBSET_LIMIT_EXCEEDED', message: err.message } }, 422);
  }
  error(`${c.req.method} ${c.req.path}: ${err.message}`);
  return c.json({ error: { code: 'INTERNAL_ERROR', message: err.message } }, 500);
});

// --- Schemas ---
const itemSchema = z.object({
  description: z.string().min(1).max(200),
  cost: z.number().finite().positive(),
  value: z.number().finite().min(0),
});

const itemsSchema = z.array(itemSchema).max(10_000);

const filterSchema = z.object({
  min: z.number().finite(),
  max: z.number().finite(),
  limit: z.number().int(),
});

const filterRequestSchema = filterSchema.extend({ items: itemsSchema });

const solveSchema = z.object({
  items: itemsSchema,
  budget: z.number().finite(),
  strategy: z.enum(['greedy', 'exhaustive']).optional().default('greedy'),
  filter: filterSchema.optional(),
});

const compareSchema = solveSchema.omit({ strategy: true });

// --- Helpers ---
function toItems(raw: z.infer<typeof itemsSchema>): Item[] {
  return raw.map((i) => createItem(i.description, i.cost, i.value));
}

function narrow(items: Item[], filter: z.infer<typeof filterSchema> | undefined): Item[] {
  return filter ? filterItems(items, filter.min, filter.max, filter.limit) : items;
}

function boundExhaustive(items: Item[]): Item[] {
  if (items.length > MAX_REQUEST_EXHAUSTIVE_ITEMS) {
    throw new SubsetLimitExceededError(items.length, MAX_REQUEST_EXHAUSTIVE_ITEMS);
  }
  return items;
}

function serializeResult(result: SolveResult) {
  return {
    ...result,
    items: result.items.map(({ description, cost, value }) => ({ description, cost, value })),
  };
}

// --- Routes ---

app.get('/health', (c) =>
  c.json({
    status: 'ok',
    service: 'armory-api',
    version: '0.1.0',
  }),
);

app.post('/v1/filter', zValidator('json', filterRequestSchema), (c) => {
  const { items, min, max, limit } = c.req.valid('json');
  const filtered = filterItems(toItems(items), min, max, limit);
  return c.json({ items: filtered, count: filtered.length });
});

app.post('/v1/solve', zValidator('json', solveSchema), (c) => {
  const { items, budget, strategy, filter } = c.req.valid('json');
  const candidates = narrow(toItems(items), filter);
  const result = solve(strategy === 'exhaustive' ? boundExhaustive(candidates) : candidates, {
    budget,
    strategy,
  });
  return c.json(serializeResult(result));
});

app.post('/v1/compare', zValidator('json', compareSchema), (c) => {
  const { items, budget, filter } = c.req.valid('json');
  const comparison = compareStrategies(boundExhaustive(narrow(toItems(items), filter)), budget);
  return c.json({
    greedy: serializeResult(comparison.greedy),
    exhaustive: serializeResult(comparison.exhaustive),
    valueGap: comparison.valueGap,
  });
});

// --- Start ---
export function startServer(port = Number(process.env.PORT ?? 3000)) {
  info(`Server starting on port ${port}`);
  serve({
    fetch: app.fetch,
    port,
  });

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function shutdown() {
  info('Shutting down...');
  process.exit(0);
}

const isDirectExecution = process.argv[1]
  ? fileURLToPath(import.meta.url) === process.argv[1]
  : false;

if (isDirectExecution) {
  startServer();
}
