// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { DuplicateBudgetEntryError, RecordNotFoundError } from '../errors.js';
import {
  BudgetEntryPatchSchema,
  BudgetYearInputSchema,
  NewBudgetEntrySchema,
  NewTransactionSchema,
  NewWorkingCapitalEntrySchema,
  UNCATEGORIZED,
  WorkingCapitalPatchSchema,
  type BudgetEntryPatch,
  type BudgetEntryRow,
  type BudgetYearInput,
  type BudgetYearRow,
  type NewBudgetEntry,
  type NewTransaction,
  type NewWorkingCapitalEntry,
  type NumericInput,
  type TransactionRow,
  type WorkingCapitalFilter,
  type WorkingCapitalPatch,
  type WorkingCapitalRow,
  type WriteContext,
} from '../types.js';
import { toTimeLabel } from '../normalize.js';
import { parseInput, requireDateKey } from '../validate.js';
import type { LedgerAccess } from './interface.js';

interface StoredTransaction {
  readonly id: string;
  readonly yearLabel: string;
  readonly txnDate: string;
  readonly timeLabel: string;
  categoryId: string | null;
  readonly description: string;
  readonly amount: number;
  readonly isExpense: boolean;
  readonly insertedByUsername: string;
}

interface StoredWorkingCapital extends WorkingCapitalRow {
  readonly budgetCategoryId: string | null;
  readonly insertedByUsername: string;
}

/**
 * In-memory implementation of LedgerAccess.
 *
 * Keeps the same referential rules a relational store would enforce:
 * budget entries and transactions need an existing budget year, deleting a
 * budget entry un-categorises the transactions booked against it, and the
 * (year, category, budget type) triple is unique. All data is lost when the
 * process exits.
 *
 * Suitable for development, testing and single-process tools.
 */
export class MemoryLedger implements LedgerAccess {
  readonly #years = new Map<string, BudgetYearRow>();
  readonly #entries = new Map<string, BudgetEntryRow>();
  readonly #transactions = new Map<string, StoredTransaction>();
  readonly #workingCapital = new Map<string, StoredWorkingCapital>();

  // -------------------------------------------------------------------------
  // Budget years
  // -------------------------------------------------------------------------

  async listBudgetYears(): Promise<readonly BudgetYearRow[]> {
    return Array.from(this.#years.values()).sort((a, b) => {
      const order = Number(a.sort_order ?? 0) - Number(b.sort_order ?? 0);
      return order !== 0 ? order : a.year_label.localeCompare(b.year_label);
    });
  }

  async getBudgetYear(yearLabel: string): Promise<BudgetYearRow | null> {
    return this.#years.get(yearLabel) ?? null;
  }

  async getOpeningCash(yearLabel: string): Promise<NumericInput> {
    return this.#years.get(yearLabel)?.opening_cash ?? null;
  }

  async getSavingsTarget(yearLabel: string): Promise<NumericInput> {
    return this.#years.get(yearLabel)?.savings_target ?? null;
  }

  async upsertBudgetYear(input: BudgetYearInput): Promise<BudgetYearRow> {
    const parsed = parseInput(BudgetYearInputSchema, input);
    const row: BudgetYearRow = {
      year_label: parsed.yearLabel,
      opening_cash: parsed.openingCash,
      savings_target: parsed.savingsTarget,
      sort_order: parsed.sortOrder,
    };
    this.#years.set(row.year_label, row);
    return row;
  }

  // -------------------------------------------------------------------------
  // Budget entries
  // -------------------------------------------------------------------------

  async listBudgetEntries(yearLabel: string): Promise<readonly BudgetEntryRow[]> {
    return Array.from(this.#entries.values()).filter((entry) => entry.year_label === yearLabel);
  }

  async addBudgetEntry(input: NewBudgetEntry): Promise<BudgetEntryRow> {
    const parsed = parseInput(NewBudgetEntrySchema, input);
    this.#requireYear(parsed.yearLabel);
    this.#assertUniqueLine(parsed.yearLabel, parsed.categoryName, parsed.budgetType);

    const row: BudgetEntryRow = {
      id: crypto.randomUUID(),
      year_label: parsed.yearLabel,
      category_name: parsed.categoryName,
      budget_type: parsed.budgetType,
      budget: parsed.budget,
    };
    this.#entries.set(row.id, row);
    return row;
  }

  async updateBudgetEntry(id: string, patch: BudgetEntryPatch): Promise<BudgetEntryRow> {
    const parsed = parseInput(BudgetEntryPatchSchema, patch);
    const current = this.#entries.get(id);
    if (current === undefined) {
      throw new RecordNotFoundError('budget entry', id);
    }

    const next: BudgetEntryRow = {
      ...current,
      category_name: parsed.categoryName ?? current.category_name,
      budget_type: parsed.budgetType ?? current.budget_type,
      budget: parsed.budget ?? current.budget,
    };
    this.#assertUniqueLine(next.year_label, next.category_name, next.budget_type, id);
    this.#entries.set(id, next);
    return next;
  }

  async deleteBudgetEntry(id: string): Promise<void> {
    if (!this.#entries.delete(id)) {
      throw new RecordNotFoundError('budget entry', id);
    }
    for (const txn of this.#transactions.values()) {
      if (txn.categoryId === id) txn.categoryId = null;
    }
    for (const [key, entry] of this.#workingCapital) {
      if (entry.budgetCategoryId === id) {
        this.#workingCapital.set(key, { ...entry, budgetCategoryId: null });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Transactions
  // -------------------------------------------------------------------------

  async listTransactions(yearLabel: string): Promise<readonly TransactionRow[]> {
    return Array.from(this.#transactions.values())
      .filter((txn) => txn.yearLabel === yearLabel)
      .sort((a, b) => a.txnDate.localeCompare(b.txnDate))
      .map((txn) => this.#toTransactionRow(txn));
  }

  async insertTransaction(input: NewTransaction, context: WriteContext): Promise<TransactionRow> {
    const parsed = parseInput(NewTransactionSchema, input);
    this.#requireYear(parsed.yearLabel);
    if (parsed.categoryId !== null && !this.#entries.has(parsed.categoryId)) {
      throw new RecordNotFoundError('budget entry', parsed.categoryId);
    }

    const txnDate = requireDateKey(parsed.txnDate, 'txnDate');
    const stored: StoredTransaction = {
      id: crypto.randomUUID(),
      yearLabel: parsed.yearLabel,
      txnDate,
      timeLabel: toTimeLabel(txnDate),
      categoryId: parsed.categoryId,
      description: parsed.description,
      amount: parsed.amount,
      isExpense: parsed.isExpense,
      insertedByUsername: context.username,
    };
    this.#transactions.set(stored.id, stored);
    return this.#toTransactionRow(stored);
  }

  async deleteTransactions(ids: readonly string[]): Promise<number> {
    let count = 0;
    for (const id of new Set(ids)) {
      if (this.#transactions.delete(id)) count++;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Working capital
  // -------------------------------------------------------------------------

  async listWorkingCapital(filter: WorkingCapitalFilter): Promise<readonly WorkingCapitalRow[]> {
    return Array.from(this.#workingCapital.values())
      .filter((entry) => {
        if (entry.kind !== filter.kind) return false;
        if (filter.bookYearLabel !== undefined && entry.book_year_label !== filter.bookYearLabel) {
          return false;
        }
        return true;
      })
      .map((entry) => toWorkingCapitalRow(entry));
  }

  async insertWorkingCapitalEntry(
    input: NewWorkingCapitalEntry,
    context: WriteContext,
  ): Promise<WorkingCapitalRow> {
    const parsed = parseInput(NewWorkingCapitalEntrySchema, input);
    if (parsed.bookYearLabel !== null) this.#requireYear(parsed.bookYearLabel);
    if (parsed.budgetCategoryId !== null && !this.#entries.has(parsed.budgetCategoryId)) {
      throw new RecordNotFoundError('budget entry', parsed.budgetCategoryId);
    }

    const stored: StoredWorkingCapital = {
      id: crypto.randomUUID(),
      book_year_label: parsed.bookYearLabel,
      kind: parsed.kind,
      kind_detail: parsed.kindDetail,
      member_username: parsed.memberUsername,
      amount: parsed.amount,
      entry_date: requireDateKey(parsed.entryDate, 'entryDate'),
      number_of_pieces: parsed.numberOfPieces,
      description: parsed.description,
      budgetCategoryId: parsed.budgetCategoryId,
      insertedByUsername: context.username,
    };
    this.#workingCapital.set(stored.id, stored);
    return toWorkingCapitalRow(stored);
  }

  async updateWorkingCapitalEntry(id: string, patch: WorkingCapitalPatch): Promise<WorkingCapitalRow> {
    const parsed = parseInput(WorkingCapitalPatchSchema, patch);
    const current = this.#workingCapital.get(id);
    if (current === undefined) {
      throw new RecordNotFoundError('working capital entry', id);
    }
    if (
      parsed.budgetCategoryId !== undefined &&
      parsed.budgetCategoryId !== null &&
      !this.#entries.has(parsed.budgetCategoryId)
    ) {
      throw new RecordNotFoundError('budget entry', parsed.budgetCategoryId);
    }

    const next: StoredWorkingCapital = {
      ...current,
      kind_detail: parsed.kindDetail !== undefined ? parsed.kindDetail : current.kind_detail,
      member_username:
        parsed.memberUsername !== undefined ? parsed.memberUsername : current.member_username,
      amount: parsed.amount ?? current.amount,
      entry_date:
        parsed.entryDate !== undefined
          ? requireDateKey(parsed.entryDate, 'entryDate')
          : current.entry_date,
      number_of_pieces:
        parsed.numberOfPieces !== undefined ? parsed.numberOfPieces : current.number_of_pieces,
      description: parsed.description ?? current.description,
      budgetCategoryId:
        parsed.budgetCategoryId !== undefined ? parsed.budgetCategoryId : current.budgetCategoryId,
    };
    this.#workingCapital.set(id, next);
    return toWorkingCapitalRow(next);
  }

  async deleteWorkingCapitalEntry(id: string): Promise<void> {
    if (!this.#workingCapital.delete(id)) {
      throw new RecordNotFoundError('working capital entry', id);
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async disconnect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  #requireYear(yearLabel: string): void {
    if (!this.#years.has(yearLabel)) {
      throw new RecordNotFoundError('budget year', yearLabel);
    }
  }

  #assertUniqueLine(
    yearLabel: string,
    categoryName: string,
    budgetType: string,
    ignoreId?: string,
  ): void {
    for (const entry of this.#entries.values()) {
      if (entry.id === ignoreId) continue;
      if (
        entry.year_label === yearLabel &&
        entry.category_name === categoryName &&
        entry.budget_type === budgetType
      ) {
        throw new DuplicateBudgetEntryError(yearLabel, categoryName, budgetType);
      }
    }
  }

  #toTransactionRow(txn: StoredTransaction): TransactionRow {
    const category =
      txn.categoryId === null ? undefined : this.#entries.get(txn.categoryId)?.category_name;
    return {
      id: txn.id,
      year_label: txn.yearLabel,
      txn_date: txn.txnDate,
      category: category ?? UNCATEGORIZED,
      description: txn.description,
      amount: txn.amount,
      is_expense: txn.isExpense,
    };
  }
}

function toWorkingCapitalRow(entry: StoredWorkingCapital): WorkingCapitalRow {
  return {
    id: entry.id,
    book_year_label: entry.book_year_label,
    kind: entry.kind,
    kind_detail: entry.kind_detail,
    member_username: entry.member_username,
    amount: entry.amount,
    entry_date: entry.entry_date,
    number_of_pieces: entry.number_of_pieces,
    description: entry.description,
  };
}
