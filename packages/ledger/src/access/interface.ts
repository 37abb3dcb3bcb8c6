// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  BudgetEntryPatch,
  BudgetEntryRow,
  BudgetYearInput,
  BudgetYearRow,
  NewBudgetEntry,
  NewTransaction,
  NewWorkingCapitalEntry,
  NumericInput,
  TransactionRow,
  WorkingCapitalFilter,
  WorkingCapitalPatch,
  WorkingCapitalRow,
  WriteContext,
} from '../types.js';

/**
 * Read side of the ledger. This is the whole contract the metrics engine
 * depends on.
 *
 * Design principles:
 *   1. All methods are async to support network-backed stores.
 *   2. Each call returns a complete, consistent snapshot for its filter:
 *      no streaming, no partial pages.
 *   3. Rows are returned as stored. Numeric columns may be strings, blanks or
 *      null; callers normalise them (see normalize.ts).
 *   4. A missing budget year is not an error: reads return empty sets and
 *      scalar reads return null.
 */
export interface LedgerReader {
  /** All budget years, ordered by `sort_order` then label. */
  listBudgetYears(): Promise<readonly BudgetYearRow[]>;

  getBudgetYear(yearLabel: string): Promise<BudgetYearRow | null>;

  getOpeningCash(yearLabel: string): Promise<NumericInput>;

  getSavingsTarget(yearLabel: string): Promise<NumericInput>;

  listBudgetEntries(yearLabel: string): Promise<readonly BudgetEntryRow[]>;

  /**
   * Working-capital rows of one kind. `bookYearLabel` scopes AR and AP rows;
   * leave it out for INVENTORY, which is not tied to a book year.
   */
  listWorkingCapital(filter: WorkingCapitalFilter): Promise<readonly WorkingCapitalRow[]>;

  /**
   * Transactions of one budget year, ordered by date, with `category` resolved
   * to the referenced budget entry's name ("Uncategorized" when unresolved).
   */
  listTransactions(yearLabel: string): Promise<readonly TransactionRow[]>;
}

/**
 * Write side of the ledger. Inputs are validated with the Zod schemas in
 * types.ts before anything is persisted.
 */
export interface LedgerWriter {
  upsertBudgetYear(input: BudgetYearInput): Promise<BudgetYearRow>;

  /** Throws DuplicateBudgetEntryError if the (year, category, type) line exists. */
  addBudgetEntry(input: NewBudgetEntry): Promise<BudgetEntryRow>;

  /** Throws RecordNotFoundError or DuplicateBudgetEntryError. */
  updateBudgetEntry(id: string, patch: BudgetEntryPatch): Promise<BudgetEntryRow>;

  /** Transactions booked against the entry become uncategorised. */
  deleteBudgetEntry(id: string): Promise<void>;

  insertTransaction(input: NewTransaction, context: WriteContext): Promise<TransactionRow>;

  /** Returns the number of transactions actually removed. */
  deleteTransactions(ids: readonly string[]): Promise<number>;

  insertWorkingCapitalEntry(
    input: NewWorkingCapitalEntry,
    context: WriteContext,
  ): Promise<WorkingCapitalRow>;

  updateWorkingCapitalEntry(id: string, patch: WorkingCapitalPatch): Promise<WorkingCapitalRow>;

  deleteWorkingCapitalEntry(id: string): Promise<void>;
}

/** A full ledger backend. */
export interface LedgerAccess extends LedgerReader, LedgerWriter {
  /** Called once before first use. Use for connection setup and migrations. */
  connect?(): Promise<void>;

  /** Called on shutdown. Use for connection teardown. */
  disconnect?(): Promise<void>;

  /** Returns true if the backend is reachable. */
  isHealthy?(): Promise<boolean>;
}
