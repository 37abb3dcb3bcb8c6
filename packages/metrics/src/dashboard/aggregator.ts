// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { BudgetEntry, BudgetType, Transaction } from '@clubledger/ledger';
import { groupSum } from '../aggregate.js';
import type { DashboardRow } from '../types.js';

export const PeriodFilterSchema = z.enum(['Everything', 'Sem1', 'Sem2', 'YearExpenses']);
export type PeriodFilter = z.infer<typeof PeriodFilterSchema>;

/**
 * Budget types shown for each reporting period. Income lines never appear:
 * the dashboard tracks spending only.
 */
export const PERIOD_BUDGET_TYPES: Readonly<Record<PeriodFilter, readonly BudgetType[]>> = {
  Everything: ['semester1', 'semester2', 'year'],
  Sem1: ['semester1'],
  Sem2: ['semester2'],
  YearExpenses: ['year'],
};

/** Expenses add to net spending; income booked on a category offsets it. */
export function signedSpending(txn: Transaction): number {
  return txn.isExpense ? txn.amount : -txn.amount;
}

/** Net spending per category name, in first-seen order. */
export function netSpendingByCategory(transactions: readonly Transaction[]): Map<string, number> {
  return groupSum(transactions, (txn) => txn.category, signedSpending);
}

/** A budget line of the period, with its type narrowed to a known one. */
export interface PeriodLine {
  readonly entry: BudgetEntry;
  readonly budgetType: BudgetType;
}

/** Budget lines whose type is shown in `period`, in ledger order. */
export function periodLines(entries: readonly BudgetEntry[], period: PeriodFilter): PeriodLine[] {
  const allowed = PERIOD_BUDGET_TYPES[period];
  return entries.flatMap((entry) =>
    entry.budgetType !== null && allowed.includes(entry.budgetType)
      ? [{ entry, budgetType: entry.budgetType }]
      : [],
  );
}

/**
 * Compare each budget line of the period with the net spending of its
 * category.
 *
 * Lines are matched to transactions by exact category name. A line whose
 * category has no transactions shows zero spending; transactions whose
 * category has no line in the period are not shown.
 */
export function buildDashboardRows(
  entries: readonly BudgetEntry[],
  transactions: readonly Transaction[],
  period: PeriodFilter,
): DashboardRow[] {
  return compareLines(periodLines(entries, period), transactions);
}

/** Dashboard rows for lines already filtered to a period. */
export function compareLines(
  lines: readonly PeriodLine[],
  transactions: readonly Transaction[],
): DashboardRow[] {
  if (lines.length === 0) return [];

  const spending = netSpendingByCategory(transactions);
  return lines.map(({ entry, budgetType }) => {
    const netSpending = spending.get(entry.categoryName) ?? 0;
    return {
      category: entry.categoryName,
      budget: entry.budget,
      netSpending,
      remaining: entry.budget - netSpending,
      budgetType,
    };
  });
}
