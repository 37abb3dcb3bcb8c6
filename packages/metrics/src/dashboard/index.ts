// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export {
  PeriodFilterSchema,
  PERIOD_BUDGET_TYPES,
  buildDashboardRows,
  compareLines,
  periodLines,
  netSpendingByCategory,
  signedSpending,
} from './aggregator.js';
export type { PeriodFilter, PeriodLine } from './aggregator.js';
export { buildCategoryOverview, prorationFactor, topTransactions } from './overview.js';
export type { TopTransactions } from './overview.js';
