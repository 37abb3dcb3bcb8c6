// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { aggregateBudgetMetrics, ZERO_BUDGET_METRICS } from './metrics.js';
export type { BudgetMetricsInput } from './metrics.js';
