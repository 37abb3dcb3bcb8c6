// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { BudgetEntry, Transaction, WorkingCapitalEntry } from '@clubledger/ledger';
import type { BudgetMetrics, CashMetrics, WorkingCapitalMetrics } from './types.js';

export const ExportFormatSchema = z.enum(['json', 'csv']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export type MetricGroup = 'Budget' | 'Cash' | 'Working Capital';

export interface MetricLine {
  readonly group: MetricGroup;
  readonly metric: string;
  readonly value: number;
}

/** Everything written into a year report, already read and normalised. */
export interface YearReport {
  readonly yearLabel: string;
  readonly currency: string;
  readonly metrics: readonly MetricLine[];
  readonly budget: readonly BudgetEntry[];
  readonly transactions: readonly Transaction[];
  readonly receivables: readonly WorkingCapitalEntry[];
  readonly payables: readonly WorkingCapitalEntry[];
  readonly inventory: readonly WorkingCapitalEntry[];
}

/** The headline figures of a year, in report order. */
export function summarizeMetrics(
  budget: BudgetMetrics,
  cash: CashMetrics,
  workingCapital: WorkingCapitalMetrics,
): MetricLine[] {
  return [
    { group: 'Budget', metric: 'Opening Cash', value: budget.openingCash },
    { group: 'Budget', metric: 'Total Income (Projected)', value: budget.totalIncome },
    { group: 'Budget', metric: 'Total Expenses (Budgeted)', value: budget.totalExpensesAll },
    { group: 'Budget', metric: 'Savings Goal', value: budget.savings },
    { group: 'Budget', metric: 'Free Float', value: budget.freeFloat },
    { group: 'Cash', metric: 'Begin Cash Position', value: cash.beginCash },
    { group: 'Cash', metric: 'Total Income (Txn)', value: cash.totalIncomeTxn },
    { group: 'Cash', metric: 'Total Expenses (Txn)', value: cash.totalExpensesTxn },
    { group: 'Cash', metric: 'Current Cash Position', value: cash.currentCash },
    { group: 'Cash', metric: 'Cash Position with NWC', value: cash.cashWithNwc },
    { group: 'Working Capital', metric: 'NWC', value: workingCapital.nwc },
    { group: 'Working Capital', metric: 'Total AR', value: workingCapital.totalAr },
    { group: 'Working Capital', metric: 'Total AP', value: workingCapital.totalAp },
    { group: 'Working Capital', metric: 'Total Inventory', value: workingCapital.totalInventory },
  ];
}

// ---------------------------------------------------------------------------
// JSON export
// ---------------------------------------------------------------------------

/** Serialise a report to one JSON object with 2-space indentation. */
export function exportJson(report: YearReport): string {
  return JSON.stringify(
    {
      yearLabel: report.yearLabel,
      currency: report.currency,
      metrics: report.metrics,
      budget: report.budget,
      transactions: report.transactions,
      ar: report.receivables,
      ap: report.payables,
      inventory: report.inventory,
    },
    null,
    2,
  );
}

// ---------------------------------------------------------------------------
// CSV export
// ---------------------------------------------------------------------------

type CsvValue = string | number | boolean | null;

interface CsvSection {
  readonly title: string;
  readonly header: readonly string[];
  readonly rows: ReadonlyArray<readonly CsvValue[]>;
}

/**
 * Escape a value for CSV embedding:
 * - Wrap in double quotes if the value contains commas, newlines, or quotes.
 * - Double any embedded double-quote characters.
 */
function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCsvLine(values: readonly CsvValue[]): string {
  return values.map((value) => (value === null ? '' : escapeCsvField(String(value)))).join(',');
}

const WORKING_CAPITAL_HEADER = [
  'id',
  'book_year_label',
  'kind',
  'kind_detail',
  'member_username',
  'amount',
  'entry_date',
  'number_of_pieces',
  'description',
] as const;

function workingCapitalRows(entries: readonly WorkingCapitalEntry[]): CsvValue[][] {
  return entries.map((entry) => [
    entry.id,
    entry.bookYearLabel,
    entry.kind,
    entry.kindDetail,
    entry.memberUsername,
    entry.amount,
    entry.entryDate,
    entry.numberOfPieces,
    entry.description,
  ]);
}

function csvSections(report: YearReport): CsvSection[] {
  return [
    {
      title: 'Metrics',
      header: ['Category', 'Metric', `Value (${report.currency})`],
      rows: report.metrics.map((line) => [line.group, line.metric, line.value]),
    },
    {
      title: 'Budget',
      header: ['id', 'year_label', 'category_name', 'budget_type', 'budget'],
      rows: report.budget.map((entry) => [
        entry.id,
        entry.yearLabel,
        entry.categoryName,
        entry.budgetType,
        entry.budget,
      ]),
    },
    {
      title: 'Transactions',
      header: ['id', 'year_label', 'txn_date', 'category', 'description', 'amount', 'is_expense'],
      rows: report.transactions.map((txn) => [
        txn.id,
        txn.yearLabel,
        txn.txnDate,
        txn.category,
        txn.description,
        txn.amount,
        txn.isExpense,
      ]),
    },
    { title: 'AR', header: WORKING_CAPITAL_HEADER, rows: workingCapitalRows(report.receivables) },
    { title: 'AP', header: WORKING_CAPITAL_HEADER, rows: workingCapitalRows(report.payables) },
    { title: 'Inventory', header: WORKING_CAPITAL_HEADER, rows: workingCapitalRows(report.inventory) },
  ];
}

/**
 * Serialise a report to CSV. Each section is a `# <Section>` line, a header
 * row and its data rows; sections are separated by one blank line.
 */
export function exportCsv(report: YearReport): string {
  return csvSections(report)
    .map((section) =>
      [`# ${section.title}`, toCsvLine(section.header), ...section.rows.map(toCsvLine)].join('\n'),
    )
    .join('\n\n');
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

/** Route a report to the format handler. */
export function renderYearReport(report: YearReport, format: ExportFormat): string {
  switch (format) {
    case 'json':
      return exportJson(report);
    case 'csv':
      return exportCsv(report);
    default: {
      const unreachable: never = format;
      throw new Error(`Unsupported export format: ${String(unreachable)}`);
    }
  }
}
