// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  BudgetEntry,
  BudgetEntryRow,
  BudgetYearRow,
  LedgerReader,
  NumericInput,
  Transaction,
  TransactionRow,
  WorkingCapitalEntry,
  WorkingCapitalFilter,
  WorkingCapitalRow,
} from '@clubledger/ledger';

export interface LedgerSnapshot {
  readonly years?: readonly BudgetYearRow[];
  readonly entries?: readonly BudgetEntryRow[];
  readonly transactions?: readonly TransactionRow[];
  readonly workingCapital?: readonly WorkingCapitalRow[];
}

/** Read-only ledger over fixed rows, exactly as a backend would return them. */
export class StubLedger implements LedgerReader {
  readonly #snapshot: LedgerSnapshot;

  constructor(snapshot: LedgerSnapshot) {
    this.#snapshot = snapshot;
  }

  async listBudgetYears(): Promise<readonly BudgetYearRow[]> {
    return this.#snapshot.years ?? [];
  }

  async getBudgetYear(yearLabel: string): Promise<BudgetYearRow | null> {
    return (this.#snapshot.years ?? []).find((year) => year.year_label === yearLabel) ?? null;
  }

  async getOpeningCash(yearLabel: string): Promise<NumericInput> {
    return (await this.getBudgetYear(yearLabel))?.opening_cash ?? null;
  }

  async getSavingsTarget(yearLabel: string): Promise<NumericInput> {
    return (await this.getBudgetYear(yearLabel))?.savings_target ?? null;
  }

  async listBudgetEntries(yearLabel: string): Promise<readonly BudgetEntryRow[]> {
    return (this.#snapshot.entries ?? []).filter((entry) => entry.year_label === yearLabel);
  }

  async listWorkingCapital(filter: WorkingCapitalFilter): Promise<readonly WorkingCapitalRow[]> {
    return (this.#snapshot.workingCapital ?? []).filter(
      (row) =>
        row.kind === filter.kind &&
        (filter.bookYearLabel === undefined || row.book_year_label === filter.bookYearLabel),
    );
  }

  async listTransactions(yearLabel: string): Promise<readonly TransactionRow[]> {
    return (this.#snapshot.transactions ?? []).filter((txn) => txn.year_label === yearLabel);
  }
}

let sequence = 0;
const nextId = (prefix: string): string => `${prefix}${++sequence}`;

export const YEAR = '2025-26';

export function yearRow(openingCash: NumericInput, savingsTarget: NumericInput = 0, yearLabel = YEAR): BudgetYearRow {
  return { year_label: yearLabel, opening_cash: openingCash, savings_target: savingsTarget, sort_order: 0 };
}

export function entryRow(
  categoryName: string,
  budgetType: string,
  budget: NumericInput,
  yearLabel = YEAR,
): BudgetEntryRow {
  return { id: nextId('b'), year_label: yearLabel, category_name: categoryName, budget_type: budgetType, budget };
}

export function txnRow(
  txnDate: string | null,
  category: string | null,
  amount: NumericInput,
  isExpense: boolean,
  yearLabel = YEAR,
): TransactionRow {
  return {
    id: nextId('t'),
    year_label: yearLabel,
    txn_date: txnDate,
    category,
    description: '',
    amount,
    is_expense: isExpense,
  };
}

export function wcRow(
  kind: 'AR' | 'AP' | 'INVENTORY',
  amount: NumericInput,
  kindDetail: string | null = null,
  bookYearLabel: string | null = kind === 'INVENTORY' ? null : YEAR,
): WorkingCapitalRow {
  return {
    id: nextId('w'),
    book_year_label: bookYearLabel,
    kind,
    kind_detail: kindDetail,
    member_username: null,
    amount,
    entry_date: '2025-01-01',
    number_of_pieces: null,
    description: '',
  };
}

// ─── Normalised records for the pure calculators ───────────────────────────

export function entry(
  categoryName: string,
  budgetType: BudgetEntry['budgetType'],
  budget: number,
): BudgetEntry {
  return { id: nextId('b'), yearLabel: YEAR, categoryName, budgetType, budget };
}

export function txn(
  txnDate: string | null,
  category: string,
  amount: number,
  isExpense: boolean,
  description = '',
): Transaction {
  return { id: nextId('t'), yearLabel: YEAR, txnDate, category, description, amount, isExpense };
}

export function wc(
  kind: WorkingCapitalEntry['kind'],
  amount: number,
  kindDetail: WorkingCapitalEntry['kindDetail'] = null,
): WorkingCapitalEntry {
  return {
    id: nextId('w'),
    bookYearLabel: kind === 'INVENTORY' ? null : YEAR,
    kind,
    kindDetail,
    memberUsername: null,
    amount,
    entryDate: '2025-01-01',
    numberOfPieces: null,
    description: '',
  };
}
