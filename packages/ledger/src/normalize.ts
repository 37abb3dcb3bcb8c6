// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { format, isValid, parseISO } from 'date-fns';
import {
  BudgetTypeSchema,
  KindDetailSchema,
  UNCATEGORIZED,
  WorkingCapitalKindSchema,
  type BudgetEntry,
  type BudgetEntryRow,
  type DateInput,
  type DateKey,
  type FlagInput,
  type NumericInput,
  type Transaction,
  type TransactionRow,
  type WorkingCapitalEntry,
  type WorkingCapitalKind,
  type WorkingCapitalRow,
} from './types.js';

/**
 * Row normalisation.
 *
 * Every numeric column coming out of a ledger backend is coerced to a finite
 * number with a zero default. Absent values (`null`, `undefined`) become 0
 * silently. Present values that do not parse also become 0, and are reported
 * through the optional `CoercionReporter` so malformed data stays visible
 * without failing the computation that read it.
 */

export type LedgerEntity = 'budget_year' | 'budget_entry' | 'transaction' | 'working_capital';

export interface CoercionNotice {
  readonly entity: LedgerEntity;
  readonly field: string;
  readonly rowId: string;
  readonly rawValue: unknown;
}

export type CoercionReporter = (notice: CoercionNotice) => void;

interface FieldOrigin {
  readonly entity: LedgerEntity;
  readonly field: string;
  readonly rowId: string;
}

// ─── Scalars ────────────────────────────────────────────────────────────────

/** Parse a number out of an untrusted value, or `null` if it holds none. */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function normalizeAmount(
  value: NumericInput,
  report?: CoercionReporter,
  origin?: FieldOrigin,
): number {
  if (value === null || value === undefined) return 0;
  const parsed = parseNumeric(value);
  if (parsed !== null) return parsed;
  if (report !== undefined && origin !== undefined) {
    report({ ...origin, rawValue: value });
  }
  return 0;
}

/**
 * Convert a date-ish value into a `YYYY-MM-DD` key.
 *
 * `Date` values are read in local time. Strings only need a leading ISO date;
 * any time part is dropped, so `2025-01-02T23:30:00Z` keys as `2025-01-02`.
 */
export function toDateKey(value: DateInput): DateKey | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return isValid(value) ? format(value, 'yyyy-MM-dd') : null;
  }
  const head = value.trim().slice(0, 10);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(head)) return null;
  return isValid(parseISO(head)) ? head : null;
}

/** Month bucket (`YYYY-MM`) stored next to a transaction's date key. */
export function toTimeLabel(key: DateKey): string {
  return key.slice(0, 7);
}

export function parseFlag(value: FlagInput): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    return ['true', 't', '1', 'yes', 'y'].includes(value.trim().toLowerCase());
  }
  return false;
}

// ─── Rows → records ─────────────────────────────────────────────────────────

export function normalizeBudgetEntry(row: BudgetEntryRow, report?: CoercionReporter): BudgetEntry {
  const budgetType = BudgetTypeSchema.safeParse(row.budget_type);
  return {
    id: row.id,
    yearLabel: row.year_label,
    categoryName: row.category_name,
    budgetType: budgetType.success ? budgetType.data : null,
    budget: normalizeAmount(row.budget, report, {
      entity: 'budget_entry',
      field: 'budget',
      rowId: row.id,
    }),
  };
}

export function normalizeTransaction(row: TransactionRow, report?: CoercionReporter): Transaction {
  const txnDate = toDateKey(row.txn_date);
  if (txnDate === null && row.txn_date !== null && row.txn_date !== undefined) {
    report?.({ entity: 'transaction', field: 'txn_date', rowId: row.id, rawValue: row.txn_date });
  }
  return {
    id: row.id,
    yearLabel: row.year_label,
    txnDate,
    category: row.category ?? UNCATEGORIZED,
    description: row.description ?? '',
    amount: normalizeAmount(row.amount, report, {
      entity: 'transaction',
      field: 'amount',
      rowId: row.id,
    }),
    isExpense: parseFlag(row.is_expense),
  };
}

/**
 * Normalise a working-capital row.
 *
 * The caller supplies the kind it asked the backend for, so a row with an
 * unexpected `kind` value is still counted under the requested bucket.
 */
export function normalizeWorkingCapitalEntry(
  row: WorkingCapitalRow,
  requestedKind: WorkingCapitalKind,
  report?: CoercionReporter,
): WorkingCapitalEntry {
  const kind = WorkingCapitalKindSchema.safeParse(row.kind);
  const kindDetail = KindDetailSchema.safeParse(row.kind_detail);
  const origin = (field: string): FieldOrigin => ({ entity: 'working_capital', field, rowId: row.id });
  const pieces =
    row.number_of_pieces === null || row.number_of_pieces === undefined
      ? null
      : Math.trunc(normalizeAmount(row.number_of_pieces, report, origin('number_of_pieces')));

  return {
    id: row.id,
    bookYearLabel: row.book_year_label,
    kind: kind.success ? kind.data : requestedKind,
    kindDetail: kindDetail.success ? kindDetail.data : null,
    memberUsername: row.member_username,
    amount: normalizeAmount(row.amount, report, origin('amount')),
    entryDate: toDateKey(row.entry_date),
    numberOfPieces: pieces,
    description: row.description ?? '',
  };
}
