// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// Types
export type {
  BudgetType,
  WorkingCapitalKind,
  KindDetail,
  NumericInput,
  DateInput,
  FlagInput,
  DateKey,
  BudgetYearRow,
  BudgetEntryRow,
  TransactionRow,
  WorkingCapitalRow,
  BudgetEntry,
  Transaction,
  WorkingCapitalEntry,
  WorkingCapitalFilter,
  WriteContext,
  BudgetYearInput,
  NewBudgetEntry,
  BudgetEntryPatch,
  NewTransaction,
  NewWorkingCapitalEntry,
  WorkingCapitalPatch,
} from './types.js';
export {
  BudgetTypeSchema,
  WorkingCapitalKindSchema,
  KindDetailSchema,
  EXPENSE_BUDGET_TYPES,
  UNCATEGORIZED,
  BudgetYearInputSchema,
  NewBudgetEntrySchema,
  BudgetEntryPatchSchema,
  NewTransactionSchema,
  NewWorkingCapitalEntrySchema,
  WorkingCapitalPatchSchema,
} from './types.js';

// Errors
export {
  LedgerError,
  LedgerAccessError,
  DuplicateBudgetEntryError,
  RecordNotFoundError,
  InvalidInputError,
  InvalidConfigError,
} from './errors.js';

// Normalisation
export type { LedgerEntity, CoercionNotice, CoercionReporter } from './normalize.js';
export {
  parseNumeric,
  normalizeAmount,
  toDateKey,
  toTimeLabel,
  parseFlag,
  normalizeBudgetEntry,
  normalizeTransaction,
  normalizeWorkingCapitalEntry,
} from './normalize.js';

// Validation
export { parseInput, parseConfig, requireDateKey } from './validate.js';

// Config
export type { PostgresConnectionConfig } from './config.js';
export { loadPostgresEnv } from './config.js';

// Access
export type {
  LedgerReader,
  LedgerWriter,
  LedgerAccess,
  PostgresClientLike,
  PostgresLedgerConfig,
} from './access/index.js';
export {
  MemoryLedger,
  PostgresLedger,
  createPostgresClient,
  createPostgresLedger,
} from './access/index.js';
