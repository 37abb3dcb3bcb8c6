// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BudgetType, DateKey } from '@clubledger/ledger';

// ─── Budget ─────────────────────────────────────────────────────────────────

/** Budgeted position of one year. Every field is 0 for an unknown or empty year. */
export interface BudgetMetrics {
  readonly openingCash: number;
  readonly totalIncome: number;
  readonly totalExpensesSem1: number;
  readonly totalExpensesSem2: number;
  readonly totalExpensesYear: number;
  /** Always `totalExpensesSem1 + totalExpensesSem2 + totalExpensesYear`. */
  readonly totalExpensesAll: number;
  /** The year's savings target. */
  readonly savings: number;
  /** `openingCash + totalIncome - totalExpensesAll - savings`. */
  readonly freeFloat: number;
}

// ─── Working capital ────────────────────────────────────────────────────────

export interface WorkingCapitalMetrics {
  readonly totalAr: number;
  readonly arMember: number;
  readonly arSponsor: number;
  readonly arOther: number;
  readonly totalAp: number;
  /** Inventory is never scoped to a book year. */
  readonly totalInventory: number;
  /** `totalAr + totalInventory - totalAp`. */
  readonly nwc: number;
}

// ─── Dashboard ──────────────────────────────────────────────────────────────

/** One budget line compared with what was actually spent in its category. */
export interface DashboardRow {
  readonly category: string;
  readonly budget: number;
  readonly netSpending: number;
  /** `budget - netSpending`. */
  readonly remaining: number;
  readonly budgetType: BudgetType;
}

/** Per-category actuals for a time window, with the prorated expense budget. */
export interface CategoryOverviewRow {
  readonly category: string;
  readonly expense: number;
  readonly income: number;
  readonly netSpending: number;
  readonly budget: number;
}

/** Half-open date range `[start, end)`. */
export interface DateWindow {
  readonly start: DateKey;
  readonly end: DateKey;
}

// ─── Cash ───────────────────────────────────────────────────────────────────

export interface CashFlowPoint {
  readonly date: DateKey;
  readonly balance: number;
}

export interface CashMetrics {
  readonly beginCash: number;
  readonly totalIncomeTxn: number;
  readonly totalExpensesTxn: number;
  readonly currentCash: number;
  readonly cashWithNwc: number;
}
