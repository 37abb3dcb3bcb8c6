// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { format } from 'date-fns';
import {
  LedgerAccessError,
  LedgerError,
  normalizeAmount,
  normalizeBudgetEntry,
  normalizeTransaction,
  normalizeWorkingCapitalEntry,
  parseInput,
  type BudgetEntry,
  type CoercionReporter,
  type LedgerReader,
  type Transaction,
  type WorkingCapitalEntry,
  type WorkingCapitalKind,
} from '@clubledger/ledger';
import { sumAmounts } from './aggregate.js';
import { aggregateBudgetMetrics, ZERO_BUDGET_METRICS } from './budget/index.js';
import {
  buildCashFlowSeries,
  cashPositionWithNwc,
  currentCashFromSeries,
} from './cashflow/index.js';
import { parseMetricsConfig, type MetricsConfig, type MetricsConfigInput } from './config.js';
import {
  buildCategoryOverview,
  compareLines,
  periodLines,
  PeriodFilterSchema,
  type PeriodFilter,
} from './dashboard/index.js';
import {
  EVENT_ACCESS_FAILED,
  EVENT_METRICS_COMPUTED,
  EVENT_VALUE_COERCED,
  MetricsEventEmitter,
} from './events.js';
import {
  ExportFormatSchema,
  renderYearReport,
  summarizeMetrics,
  type ExportFormat,
} from './export.js';
import { currentFiscalYearWindow } from './fiscal.js';
import type { MetricsTracer } from './telemetry/index.js';
import { aggregateWorkingCapital } from './working-capital/index.js';
import type {
  BudgetMetrics,
  CashFlowPoint,
  CashMetrics,
  CategoryOverviewRow,
  DashboardRow,
  DateWindow,
  WorkingCapitalMetrics,
} from './types.js';

export interface MetricsEngineOptions {
  /** Read side of the ledger. The engine never writes. */
  ledger: LedgerReader;
  config?: MetricsConfigInput;
  /** Receives computed, coerced and access-failure events. */
  events?: MetricsEventEmitter;
  /** Wraps every public computation in an OTel-compatible span. */
  tracer?: MetricsTracer;
  /** Clock used for "today". Defaults to the system clock. */
  now?: () => Date;
}

interface YearOpening {
  readonly openingCash: number;
  readonly savingsTarget: number;
}

/**
 * MetricsEngine turns ledger snapshots into the dashboard figures of one
 * budget year.
 *
 * Every computation reads what it needs from the ledger, normalises the rows
 * and aggregates them. Nothing is cached, so two calls against unchanged data
 * give the same result.
 *
 * Missing data is never an error: unknown years, empty result sets and
 * malformed numbers all resolve to zero. Malformed values are announced on
 * the `ledger:value:coerced` event. The only failures that reach the caller
 * are failures of the ledger itself, as LedgerAccessError.
 *
 * Usage:
 * ```ts
 * const engine = new MetricsEngine({ ledger: new MemoryLedger() });
 * const metrics = await engine.computeBudgetMetrics('2025-26');
 * console.log(metrics.freeFloat);
 * ```
 */
export class MetricsEngine {
  readonly #ledger: LedgerReader;
  readonly #config: MetricsConfig;
  readonly #events: MetricsEventEmitter;
  readonly #tracer: MetricsTracer | undefined;
  readonly #now: () => Date;
  readonly #report: CoercionReporter;

  /**
   * @throws {InvalidConfigError} When `options.config` fails validation.
   */
  constructor(options: MetricsEngineOptions) {
    this.#ledger = options.ledger;
    this.#config = parseMetricsConfig(options.config ?? {});
    this.#events = options.events ?? new MetricsEventEmitter();
    this.#tracer = options.tracer;
    this.#now = options.now ?? (() => new Date());
    this.#report = (notice) => {
      this.#events.emit(EVENT_VALUE_COERCED, { ...notice, timestamp: this.#timestamp() });
    };
  }

  /** The event emitter this engine publishes on. */
  get events(): MetricsEventEmitter {
    return this.#events;
  }

  /** The validated configuration, with defaults applied. */
  get config(): MetricsConfig {
    return this.#config;
  }

  // -------------------------------------------------------------------------
  // Budget
  // -------------------------------------------------------------------------

  /** Budgeted income, expenses and free float. All zeros for a blank label. */
  async computeBudgetMetrics(yearLabel: string): Promise<BudgetMetrics> {
    return this.#run('computeBudgetMetrics', yearLabel, () => this.#budgetMetrics(yearLabel));
  }

  // -------------------------------------------------------------------------
  // Working capital
  // -------------------------------------------------------------------------

  async computeWorkingCapitalMetrics(yearLabel: string): Promise<WorkingCapitalMetrics> {
    return this.#run('computeWorkingCapitalMetrics', yearLabel, () =>
      this.#workingCapitalMetrics(yearLabel),
    );
  }

  // -------------------------------------------------------------------------
  // Dashboard
  // -------------------------------------------------------------------------

  /**
   * Budget lines of the period next to the net spending of their category.
   * Transactions are only read when the period has at least one line.
   *
   * @throws {InvalidInputError} When `period` is not a known filter.
   */
  async computeDashboardData(yearLabel: string, period: PeriodFilter): Promise<DashboardRow[]> {
    const filter = parseInput(PeriodFilterSchema, period);
    return this.#run('computeDashboardData', yearLabel, async () => {
      const lines = periodLines(await this.#budgetEntries(yearLabel), filter);
      if (lines.length === 0) return [];
      return compareLines(lines, await this.#transactions(yearLabel));
    });
  }

  /**
   * Expense, income and net spending per category inside `window` (the whole
   * year when omitted), next to each category's prorated expense budget.
   */
  async computeCategoryOverview(
    yearLabel: string,
    window?: DateWindow,
  ): Promise<CategoryOverviewRow[]> {
    return this.#run('computeCategoryOverview', yearLabel, async () => {
      const [entries, transactions] = await Promise.all([
        this.#budgetEntries(yearLabel),
        this.#transactions(yearLabel),
      ]);
      return buildCategoryOverview(entries, transactions, window);
    });
  }

  /** The financial year containing today, per `config.fiscalYear`. */
  currentFiscalYearWindow(): DateWindow {
    const { startMonth, startDay } = this.#config.fiscalYear;
    return currentFiscalYearWindow(startMonth, startDay, this.#now());
  }

  // -------------------------------------------------------------------------
  // Cash
  // -------------------------------------------------------------------------

  /** Daily closing balances from opening cash, oldest first. Never empty. */
  async computeCashFlow(yearLabel: string): Promise<CashFlowPoint[]> {
    return this.#run('computeCashFlow', yearLabel, async () => {
      const { openingCash } = await this.#opening(yearLabel);
      return this.#cashFlow(openingCash, await this.#transactions(yearLabel));
    });
  }

  /** Balance of the last cash-flow point. */
  async currentCashPosition(yearLabel: string): Promise<number> {
    return this.#run('currentCashPosition', yearLabel, () => this.#currentCash(yearLabel));
  }

  /** Current cash plus net working capital. */
  async cashPositionWithNwc(yearLabel: string): Promise<number> {
    return this.#run('cashPositionWithNwc', yearLabel, async () => {
      const [currentCash, workingCapital] = await Promise.all([
        this.#currentCash(yearLabel),
        this.#workingCapitalMetrics(yearLabel),
      ]);
      return cashPositionWithNwc(currentCash, workingCapital.nwc);
    });
  }

  /**
   * Actual cash figures of the year. Transaction totals cover the dated
   * transactions, the same set the cash-flow series is built from.
   */
  async computeCashMetrics(yearLabel: string): Promise<CashMetrics> {
    return this.#run('computeCashMetrics', yearLabel, () => this.#cashMetrics(yearLabel));
  }

  // -------------------------------------------------------------------------
  // Export
  // -------------------------------------------------------------------------

  /**
   * Render the year's metrics and raw ledger rows as one document.
   *
   * @throws {InvalidInputError} When `exportFormat` is not supported.
   */
  async exportYearReport(yearLabel: string, exportFormat: ExportFormat): Promise<string> {
    const formatName = parseInput(ExportFormatSchema, exportFormat);
    return this.#run('exportYearReport', yearLabel, async () => {
      const [budget, cash, workingCapital, entries, transactions, receivables, payables, inventory] =
        await Promise.all([
          this.#budgetMetrics(yearLabel),
          this.#cashMetrics(yearLabel),
          this.#workingCapitalMetrics(yearLabel),
          this.#budgetEntries(yearLabel),
          this.#transactions(yearLabel),
          this.#workingCapitalEntries('AR', yearLabel),
          this.#workingCapitalEntries('AP', yearLabel),
          this.#workingCapitalEntries('INVENTORY'),
        ]);

      return renderYearReport(
        {
          yearLabel,
          currency: this.#config.currency,
          metrics: summarizeMetrics(budget, cash, workingCapital),
          budget: entries,
          transactions,
          receivables,
          payables,
          inventory,
        },
        formatName,
      );
    });
  }

  // -------------------------------------------------------------------------
  // Computations
  // -------------------------------------------------------------------------

  async #budgetMetrics(yearLabel: string): Promise<BudgetMetrics> {
    if (yearLabel.trim() === '') return ZERO_BUDGET_METRICS;
    const [{ openingCash, savingsTarget }, entries] = await Promise.all([
      this.#opening(yearLabel),
      this.#budgetEntries(yearLabel),
    ]);
    return aggregateBudgetMetrics({ openingCash, savingsTarget, entries });
  }

  async #workingCapitalMetrics(yearLabel: string): Promise<WorkingCapitalMetrics> {
    const [receivables, payables, inventory] = await Promise.all([
      this.#workingCapitalEntries('AR', yearLabel),
      this.#workingCapitalEntries('AP', yearLabel),
      this.#workingCapitalEntries('INVENTORY'),
    ]);
    return aggregateWorkingCapital({ receivables, payables, inventory });
  }

  #cashFlow(openingCash: number, transactions: readonly Transaction[]): CashFlowPoint[] {
    return buildCashFlowSeries(openingCash, transactions, {
      today: format(this.#now(), 'yyyy-MM-dd'),
      seedOpeningPoint: this.#config.cashFlow.seedOpeningPoint,
    });
  }

  async #currentCash(yearLabel: string): Promise<number> {
    const [{ openingCash }, transactions] = await Promise.all([
      this.#opening(yearLabel),
      this.#transactions(yearLabel),
    ]);
    return currentCashFromSeries(this.#cashFlow(openingCash, transactions), openingCash);
  }

  async #cashMetrics(yearLabel: string): Promise<CashMetrics> {
    const [{ openingCash }, transactions, workingCapital] = await Promise.all([
      this.#opening(yearLabel),
      this.#transactions(yearLabel),
      this.#workingCapitalMetrics(yearLabel),
    ]);
    const dated = transactions.filter((txn) => txn.txnDate !== null);
    const currentCash = currentCashFromSeries(this.#cashFlow(openingCash, dated), openingCash);

    return {
      beginCash: openingCash,
      totalIncomeTxn: sumAmounts(
        dated.filter((txn) => !txn.isExpense),
        (txn) => txn.amount,
      ),
      totalExpensesTxn: sumAmounts(
        dated.filter((txn) => txn.isExpense),
        (txn) => txn.amount,
      ),
      currentCash,
      cashWithNwc: cashPositionWithNwc(currentCash, workingCapital.nwc),
    };
  }

  // -------------------------------------------------------------------------
  // Ledger reads
  // -------------------------------------------------------------------------

  async #opening(yearLabel: string): Promise<YearOpening> {
    const [openingCash, savingsTarget] = await Promise.all([
      this.#read('getOpeningCash', yearLabel, () => this.#ledger.getOpeningCash(yearLabel)),
      this.#read('getSavingsTarget', yearLabel, () => this.#ledger.getSavingsTarget(yearLabel)),
    ]);
    const origin = (field: string) => ({ entity: 'budget_year' as const, field, rowId: yearLabel });
    return {
      openingCash: normalizeAmount(openingCash, this.#report, origin('opening_cash')),
      savingsTarget: normalizeAmount(savingsTarget, this.#report, origin('savings_target')),
    };
  }

  async #budgetEntries(yearLabel: string): Promise<BudgetEntry[]> {
    const rows = await this.#read('listBudgetEntries', yearLabel, () =>
      this.#ledger.listBudgetEntries(yearLabel),
    );
    return rows.map((row) => normalizeBudgetEntry(row, this.#report));
  }

  async #transactions(yearLabel: string): Promise<Transaction[]> {
    const rows = await this.#read('listTransactions', yearLabel, () =>
      this.#ledger.listTransactions(yearLabel),
    );
    return rows.map((row) => normalizeTransaction(row, this.#report));
  }

  /** Omit `yearLabel` to read every book year; inventory is always read that way. */
  async #workingCapitalEntries(
    kind: WorkingCapitalKind,
    yearLabel?: string,
  ): Promise<WorkingCapitalEntry[]> {
    const rows = await this.#read('listWorkingCapital', yearLabel ?? '', () =>
      this.#ledger.listWorkingCapital(
        yearLabel === undefined ? { kind } : { kind, bookYearLabel: yearLabel },
      ),
    );
    return rows.map((row) => normalizeWorkingCapitalEntry(row, kind, this.#report));
  }

  // -------------------------------------------------------------------------
  // Plumbing
  // -------------------------------------------------------------------------

  /**
   * Call the ledger. Failures that are not already LedgerErrors are wrapped
   * in LedgerAccessError; every failure is announced on
   * `ledger:access:failed`.
   */
  async #read<T>(operation: string, yearLabel: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error: unknown) {
      const failure = error instanceof LedgerError ? error : new LedgerAccessError(operation, error);
      this.#events.emit(EVENT_ACCESS_FAILED, {
        operation,
        yearLabel,
        message: failure.message,
        timestamp: this.#timestamp(),
      });
      throw failure;
    }
  }

  /** Time a public computation, trace it when a tracer is set, and announce it. */
  async #run<T>(metric: string, yearLabel: string, compute: () => Promise<T>): Promise<T> {
    const started = performance.now();
    const result =
      this.#tracer !== undefined
        ? await this.#tracer.traceComputation(metric, yearLabel, compute)
        : await compute();
    this.#events.emit(EVENT_METRICS_COMPUTED, {
      metric,
      yearLabel,
      durationMs: performance.now() - started,
      timestamp: this.#timestamp(),
    });
    return result;
  }

  #timestamp(): string {
    return this.#now().toISOString();
  }
}
