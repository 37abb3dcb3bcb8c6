// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { MemoryLedger } from '@clubledger/ledger';
import { aggregateBudgetMetrics, ZERO_BUDGET_METRICS } from '../src/budget/index.js';
import { MetricsEngine } from '../src/engine.js';
import { EVENT_VALUE_COERCED } from '../src/events.js';
import { entry, entryRow, StubLedger, YEAR, yearRow } from './helpers.js';

describe('aggregateBudgetMetrics', () => {
  it('computes free float from budgeted income, expenses and savings', () => {
    const metrics = aggregateBudgetMetrics({
      openingCash: 50,
      savingsTarget: 30,
      entries: [
        entry('Membership', 'income', 1000),
        entry('Events', 'semester1', 200),
        entry('Events', 'semester2', 150),
        entry('Insurance', 'year', 100),
      ],
    });

    expect(metrics).toEqual({
      openingCash: 50,
      totalIncome: 1000,
      totalExpensesSem1: 200,
      totalExpensesSem2: 150,
      totalExpensesYear: 100,
      totalExpensesAll: 450,
      savings: 30,
      freeFloat: 570,
    });
  });

  it('keeps total expenses equal to the sum of the three expense types', () => {
    const metrics = aggregateBudgetMetrics({
      openingCash: 0,
      savingsTarget: 0,
      entries: [entry('A', 'semester1', 0.1), entry('B', 'semester2', 0.2), entry('C', 'year', 0.3)],
    });
    expect(metrics.totalExpensesAll).toBe(
      metrics.totalExpensesSem1 + metrics.totalExpensesSem2 + metrics.totalExpensesYear,
    );
  });

  it('sums many lines of one type to the exact cent', () => {
    const entries = Array.from({ length: 10 }, (_, i) => entry(`Cat ${i}`, 'semester1', 0.1));
    expect(aggregateBudgetMetrics({ openingCash: 0, savingsTarget: 0, entries }).totalExpensesSem1).toBe(1);
  });

  it('leaves lines of an unknown type out of every total', () => {
    const metrics = aggregateBudgetMetrics({
      openingCash: 0,
      savingsTarget: 0,
      entries: [entry('Gala', null, 500), entry('Gala', 'year', 20)],
    });
    expect(metrics.totalExpensesAll).toBe(20);
    expect(metrics.totalIncome).toBe(0);
  });
});

describe('MetricsEngine.computeBudgetMetrics', () => {
  it('returns all zeros for a year that is not in the ledger', async () => {
    const engine = new MetricsEngine({ ledger: new StubLedger({ years: [yearRow(100)] }) });
    expect(await engine.computeBudgetMetrics('1999-00')).toEqual(ZERO_BUDGET_METRICS);
  });

  it('returns all zeros for a blank year label without reading the ledger', async () => {
    const ledger = new StubLedger({ years: [yearRow(100)] });
    const spy = vi.spyOn(ledger, 'getOpeningCash');
    const engine = new MetricsEngine({ ledger });

    expect(await engine.computeBudgetMetrics('')).toEqual(ZERO_BUDGET_METRICS);
    expect(spy).not.toHaveBeenCalled();
  });

  it('reads string numerics the way Postgres returns them', async () => {
    const engine = new MetricsEngine({
      ledger: new StubLedger({
        years: [yearRow('50.00', '30.00')],
        entries: [
          entryRow('Membership', 'income', '1000.00'),
          entryRow('Events', 'semester1', '200.00'),
          entryRow('Events', 'semester2', '150.00'),
          entryRow('Insurance', 'year', '100.00'),
        ],
      }),
    });
    const metrics = await engine.computeBudgetMetrics(YEAR);
    expect(metrics.freeFloat).toBe(570);
    expect(metrics.totalExpensesAll).toBe(450);
  });

  it('treats malformed budgets as zero and announces them', async () => {
    const broken = entryRow('Events', 'semester1', 'TBD');
    const engine = new MetricsEngine({
      ledger: new StubLedger({
        years: [yearRow(0)],
        entries: [broken, entryRow('Insurance', 'year', 40)],
      }),
      now: () => new Date('2025-06-01T12:00:00Z'),
    });
    const coerced = vi.fn();
    engine.events.on(EVENT_VALUE_COERCED, coerced);

    const metrics = await engine.computeBudgetMetrics(YEAR);

    expect(metrics.totalExpensesSem1).toBe(0);
    expect(metrics.totalExpensesAll).toBe(40);
    expect(coerced).toHaveBeenCalledOnce();
    expect(coerced).toHaveBeenCalledWith({
      entity: 'budget_entry',
      field: 'budget',
      rowId: broken.id,
      rawValue: 'TBD',
      timestamp: '2025-06-01T12:00:00.000Z',
    });
  });

  it('treats a missing opening cash and savings target as zero', async () => {
    const engine = new MetricsEngine({
      ledger: new StubLedger({
        years: [yearRow(null, null)],
        entries: [entryRow('Membership', 'income', 10)],
      }),
    });
    const metrics = await engine.computeBudgetMetrics(YEAR);
    expect(metrics.openingCash).toBe(0);
    expect(metrics.savings).toBe(0);
    expect(metrics.freeFloat).toBe(10);
  });

  it('keeps amounts below a cent in the totals', async () => {
    const ledger = new MemoryLedger();
    await ledger.upsertBudgetYear({ yearLabel: YEAR });
    for (const categoryName of ['Stamps', 'Pens', 'Clips']) {
      await ledger.addBudgetEntry({ yearLabel: YEAR, categoryName, budgetType: 'semester1', budget: 0.004 });
    }

    const metrics = await new MetricsEngine({ ledger }).computeBudgetMetrics(YEAR);
    expect(metrics.totalExpensesSem1).toBe(0.012);
    expect(metrics.freeFloat).toBe(-0.012);
  });
});
