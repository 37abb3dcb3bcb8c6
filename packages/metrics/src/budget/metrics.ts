// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BudgetEntry } from '@clubledger/ledger';
import { groupSum } from '../aggregate.js';
import type { BudgetMetrics } from '../types.js';

export const ZERO_BUDGET_METRICS: BudgetMetrics = Object.freeze({
  openingCash: 0,
  totalIncome: 0,
  totalExpensesSem1: 0,
  totalExpensesSem2: 0,
  totalExpensesYear: 0,
  totalExpensesAll: 0,
  savings: 0,
  freeFloat: 0,
});

export interface BudgetMetricsInput {
  readonly openingCash: number;
  readonly savingsTarget: number;
  readonly entries: readonly BudgetEntry[];
}

/**
 * Aggregate a year's budget lines by type.
 *
 * Lines whose type is outside the known set carry `budgetType: null` after
 * normalisation and are left out of every total.
 */
export function aggregateBudgetMetrics(input: BudgetMetricsInput): BudgetMetrics {
  const byType = groupSum(
    input.entries,
    (entry) => entry.budgetType,
    (entry) => entry.budget,
  );

  const totalIncome = byType.get('income') ?? 0;
  const totalExpensesSem1 = byType.get('semester1') ?? 0;
  const totalExpensesSem2 = byType.get('semester2') ?? 0;
  const totalExpensesYear = byType.get('year') ?? 0;
  const totalExpensesAll = totalExpensesSem1 + totalExpensesSem2 + totalExpensesYear;

  return {
    openingCash: input.openingCash,
    totalIncome,
    totalExpensesSem1,
    totalExpensesSem2,
    totalExpensesYear,
    totalExpensesAll,
    savings: input.savingsTarget,
    freeFloat: input.openingCash + totalIncome - totalExpensesAll - input.savingsTarget,
  };
}
