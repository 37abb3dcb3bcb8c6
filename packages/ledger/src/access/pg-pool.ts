// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import pg from 'pg';
import type { PostgresConnectionConfig } from '../config.js';
import { PostgresLedger, type PostgresClientLike } from './postgres.js';

/**
 * Adapt a node-postgres Pool to PostgresClientLike.
 *
 * The pool is created lazily by node-postgres; no connection is opened until
 * the first query.
 */
export function createPostgresClient(config: PostgresConnectionConfig): PostgresClientLike {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.poolMax,
  });

  return {
    async query<T extends object>(
      text: string,
      values?: unknown[],
    ): Promise<{ rows: T[]; rowCount: number | null }> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    async end() {
      await pool.end();
    },
  };
}

/** Build a PostgresLedger backed by a fresh node-postgres pool. */
export function createPostgresLedger(config: PostgresConnectionConfig): PostgresLedger {
  return new PostgresLedger({
    client: createPostgresClient(config),
    schema: config.schema,
  });
}
