// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { EXPENSE_BUDGET_TYPES, type BudgetEntry, type Transaction } from '@clubledger/ledger';
import { groupSum, roundMoney } from '../aggregate.js';
import { inWindow, monthsInRange } from '../fiscal.js';
import type { CategoryOverviewRow, DateWindow } from '../types.js';

/**
 * Share of a yearly budget that applies to a window: one twelfth per
 * calendar month touched, capped at the full year. Without a window the
 * whole budget applies.
 */
export function prorationFactor(window?: DateWindow): number {
  if (window === undefined) return 1;
  return Math.min(12, monthsInRange(window.start, window.end)) / 12;
}

/**
 * Expense, income and net spending per category for the transactions dated
 * inside `window` (all dated transactions when omitted), next to the
 * category's prorated expense budget.
 *
 * Rows are sorted by expense, largest first. Only categories with at least
 * one transaction in the window appear.
 */
export function buildCategoryOverview(
  entries: readonly BudgetEntry[],
  transactions: readonly Transaction[],
  window?: DateWindow,
): CategoryOverviewRow[] {
  const inRange = transactions.filter(
    (txn) => txn.txnDate !== null && (window === undefined || inWindow(txn.txnDate, window)),
  );

  const expense = groupSum(inRange, (txn) => txn.category, (txn) => (txn.isExpense ? txn.amount : 0));
  const income = groupSum(inRange, (txn) => txn.category, (txn) => (txn.isExpense ? 0 : txn.amount));
  const budgets = groupSum(
    entries,
    (entry) =>
      entry.budgetType !== null && EXPENSE_BUDGET_TYPES.includes(entry.budgetType)
        ? entry.categoryName
        : null,
    (entry) => entry.budget,
  );
  const factor = prorationFactor(window);

  const rows: CategoryOverviewRow[] = [];
  for (const [category, categoryExpense] of expense) {
    const categoryIncome = income.get(category) ?? 0;
    rows.push({
      category,
      expense: categoryExpense,
      income: categoryIncome,
      netSpending: roundMoney(categoryExpense - categoryIncome),
      budget: roundMoney((budgets.get(category) ?? 0) * factor),
    });
  }
  return rows.sort((a, b) => b.expense - a.expense);
}

export interface TopTransactions {
  readonly costs: readonly Transaction[];
  readonly incomes: readonly Transaction[];
}

/** The `n` largest costs and incomes booked on one category. */
export function topTransactions(
  transactions: readonly Transaction[],
  category: string,
  n = 3,
): TopTransactions {
  const own = transactions.filter((txn) => txn.category === category && txn.amount > 0);
  const largest = (items: Transaction[]): Transaction[] =>
    items.sort((a, b) => b.amount - a.amount).slice(0, n);
  return {
    costs: largest(own.filter((txn) => txn.isExpense)),
    incomes: largest(own.filter((txn) => !txn.isExpense)),
  };
}
