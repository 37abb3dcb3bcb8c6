// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// Engine
export { MetricsEngine } from './engine.js';
export type { MetricsEngineOptions } from './engine.js';

// Types
export type {
  BudgetMetrics,
  WorkingCapitalMetrics,
  DashboardRow,
  CategoryOverviewRow,
  DateWindow,
  CashFlowPoint,
  CashMetrics,
} from './types.js';

// Config
export { MetricsConfigSchema, parseMetricsConfig } from './config.js';
export type {
  MetricsConfig,
  MetricsConfigInput,
  FiscalYearConfig,
  CashFlowConfig,
} from './config.js';

// Calculators
export { aggregateBudgetMetrics, ZERO_BUDGET_METRICS } from './budget/index.js';
export type { BudgetMetricsInput } from './budget/index.js';
export { aggregateWorkingCapital } from './working-capital/index.js';
export type { WorkingCapitalInput } from './working-capital/index.js';
export {
  PeriodFilterSchema,
  PERIOD_BUDGET_TYPES,
  buildDashboardRows,
  compareLines,
  periodLines,
  netSpendingByCategory,
  signedSpending,
  buildCategoryOverview,
  prorationFactor,
  topTransactions,
} from './dashboard/index.js';
export type { PeriodFilter, PeriodLine, TopTransactions } from './dashboard/index.js';
export {
  buildCashFlowSeries,
  signedFlow,
  currentCashFromSeries,
  cashPositionWithNwc,
} from './cashflow/index.js';
export type { CashFlowOptions } from './cashflow/index.js';
export { roundMoney, sumAmounts, groupSum } from './aggregate.js';
export { currentFiscalYearWindow, monthsInRange, inWindow } from './fiscal.js';

// Export
export {
  ExportFormatSchema,
  renderYearReport,
  exportJson,
  exportCsv,
  summarizeMetrics,
} from './export.js';
export type { ExportFormat, YearReport, MetricLine, MetricGroup } from './export.js';

// Events
export {
  MetricsEventEmitter,
  EVENT_METRICS_COMPUTED,
  EVENT_VALUE_COERCED,
  EVENT_ACCESS_FAILED,
} from './events.js';
export type {
  MetricsEventName,
  MetricsEventListener,
  MetricsEventPayloadMap,
  MetricsComputedEventPayload,
  ValueCoercedEventPayload,
  AccessFailedEventPayload,
} from './events.js';

// Telemetry
export { MetricsTracer } from './telemetry/index.js';
export type { OTelSpanLike, OTelTracerLike, MetricsOTelConfig } from './telemetry/index.js';
