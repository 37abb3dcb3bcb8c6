// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { LedgerReader, LedgerWriter, LedgerAccess } from './interface.js';
export { MemoryLedger } from './memory.js';
export { PostgresLedger } from './postgres.js';
export type { PostgresClientLike, PostgresLedgerConfig } from './postgres.js';
export { createPostgresClient, createPostgresLedger } from './pg-pool.js';
