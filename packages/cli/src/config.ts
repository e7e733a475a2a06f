/**
 * Armory CLI configuration: defaults, then ARMORY_* environment variables,
 * then command-line flags.
 */

import { ConfigError } from '@armory/core';
import { z } from 'zod';

export interface ArmoryConfig {
  /** Gold budget handed to the solvers */
  budget: number;
  /** Lowest defense kept by the filter */
  minDefense: number;
  /** Highest defense kept by the filter */
  maxDefense: number;
  /** Number of items the filter keeps */
  limit: number;
}

export const DEFAULT_CONFIG: ArmoryConfig = {
  budget: 500,
  minDefense: 1,
  maxDefense: 2500,
  limit: 6,
};

export interface ConfigFlags {
  budget?: string;
  min?: string;
  max?: string;
  limit?: string;
}

const ENV_KEYS = {
  budget: 'ARMORY_BUDGET',
  minDefense: 'ARMORY_MIN_DEFENSE',
  maxDefense: 'ARMORY_MAX_DEFENSE',
  limit: 'ARMORY_LIMIT',
} as const;

const configSchema = z
  .object({
    budget: z.coerce.number().finite(),
    minDefense: z.coerce.number().finite(),
    maxDefense: z.coerce.number().finite(),
    limit: z.coerce.number().int().min(0),
  })
  .refine((c) => c.minDefense <= c.maxDefense, {
    message: 'min defense must not exceed max defense',
    path: ['minDefense'],
  });

/**
 * Merge defaults, environment and flags into a validated config.
 *
 * @throws ConfigError naming the first invalid field.
 */
export function resolveConfig(
  flags: ConfigFlags = {},
  env: Record<string, string | undefined> = process.env,
): ArmoryConfig {
  const raw = {
    budget: flags.budget ?? env[ENV_KEYS.budget] ?? DEFAULT_CONFIG.budget,
    minDefense: flags.min ?? env[ENV_KEYS.minDefense] ?? DEFAULT_CONFIG.minDefense,
    maxDefense: flags.max ?? env[ENV_KEYS.maxDefense] ?? DEFAULT_CONFIG.maxDefense,
    limit: flags.limit ?? env[ENV_KEYS.limit] ?? DEFAULT_CONFIG.limit,
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigError(`Invalid ${field}: ${issue.message}`, field);
  }
  return parsed.data;
}
