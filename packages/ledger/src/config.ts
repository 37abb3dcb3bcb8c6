// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { parseConfig } from './validate.js';

// ---------------------------------------------------------------------------
// Postgres connection config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the environment variables read by `loadPostgresEnv`.
 *
 * Values arrive as strings; blank strings count as unset.
 */
const PostgresEnvSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL must be set'),
  LEDGER_SCHEMA: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'LEDGER_SCHEMA must be a plain SQL identifier')
    .default('public'),
  LEDGER_POOL_MAX: z.coerce.number().int().positive().max(100).default(5),
});

export interface PostgresConnectionConfig {
  readonly connectionString: string;
  readonly schema: string;
  readonly poolMax: number;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read the Postgres connection settings from an environment map.
 *
 * @param env - Defaults to `process.env`.
 * @throws {InvalidConfigError} When DATABASE_URL is missing or a value is malformed.
 */
export function loadPostgresEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): PostgresConnectionConfig {
  const parsed = parseConfig(PostgresEnvSchema, {
    DATABASE_URL: blankToUndefined(env['DATABASE_URL']),
    LEDGER_SCHEMA: blankToUndefined(env['LEDGER_SCHEMA']),
    LEDGER_POOL_MAX: blankToUndefined(env['LEDGER_POOL_MAX']),
  });
  return {
    connectionString: parsed.DATABASE_URL,
    schema: parsed.LEDGER_SCHEMA,
    poolMax: parsed.LEDGER_POOL_MAX,
  };
}
