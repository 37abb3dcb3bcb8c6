// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import {
  buildCashFlowSeries,
  cashPositionWithNwc,
  currentCashFromSeries,
} from '../src/cashflow/index.js';
import { MetricsEngine } from '../src/engine.js';
import { StubLedger, txn, txnRow, wcRow, yearRow } from './helpers.js';

const TODAY = '2025-06-01';

describe('buildCashFlowSeries', () => {
  it('nets same-day movements into one closing balance per day', () => {
    const series = buildCashFlowSeries(
      100,
      [
        txn('2025-01-02', 'Membership', 80, false),
        txn('2025-01-02', 'Food', 30, true),
        txn('2025-01-03', 'Food', 30, true),
      ],
      { today: TODAY },
    );
    expect(series).toEqual([
      { date: '2025-01-02', balance: 150 },
      { date: '2025-01-03', balance: 120 },
    ]);
    expect(currentCashFromSeries(series, 100)).toBe(120);
  });

  it('falls back to a single point at today without transactions', () => {
    expect(buildCashFlowSeries(500, [], { today: TODAY })).toEqual([{ date: TODAY, balance: 500 }]);
  });

  it('orders points by date whatever the input order', () => {
    const series = buildCashFlowSeries(
      0,
      [
        txn('2025-03-01', 'Bar', 10, false),
        txn('2025-01-15', 'Bar', 5, false),
        txn('2025-02-01', 'Bar', 1, true),
      ],
      { today: TODAY },
    );
    expect(series.map((point) => point.date)).toEqual(['2025-01-15', '2025-02-01', '2025-03-01']);
    expect(series.map((point) => point.balance)).toEqual([5, 4, 14]);
  });

  it('leaves out transactions without a date', () => {
    const series = buildCashFlowSeries(
      10,
      [txn(null, 'Bar', 99, true), txn('2025-01-05', 'Bar', 2.5, false)],
      { today: TODAY },
    );
    expect(series).toEqual([{ date: '2025-01-05', balance: 12.5 }]);
  });

  it('uses the fallback point when no transaction has a date', () => {
    expect(buildCashFlowSeries(10, [txn(null, 'Bar', 99, true)], { today: TODAY })).toEqual([
      { date: TODAY, balance: 10 },
    ]);
  });

  it('prepends the opening balance on the day before the first transaction when asked', () => {
    const series = buildCashFlowSeries(200, [txn('2025-03-01', 'Bar', 50, true)], {
      today: TODAY,
      seedOpeningPoint: true,
    });
    expect(series).toEqual([
      { date: '2025-02-28', balance: 200 },
      { date: '2025-03-01', balance: 150 },
    ]);
  });

  it('keeps cent-exact balances over many small movements', () => {
    const movements = Array.from({ length: 10 }, (_, day) =>
      txn(`2025-01-${String(day + 10)}`, 'Bar', 0.1, false),
    );
    expect(buildCashFlowSeries(0, movements, { today: TODAY }).at(-1)?.balance).toBe(1);
  });
});

describe('cash position helpers', () => {
  it('returns the opening cash for an empty series', () => {
    expect(currentCashFromSeries([], 42)).toBe(42);
  });

  it('adds net working capital to current cash', () => {
    expect(cashPositionWithNwc(120, -20)).toBe(100);
  });
});

describe('MetricsEngine cash flow', () => {
  const now = () => new Date(2025, 5, 1, 12);

  const ledger = new StubLedger({
    years: [yearRow(100)],
    transactions: [
      txnRow('2025-01-02', 'Membership', '80', false),
      txnRow('2025-01-02', 'Food', '30', true),
      txnRow('2025-01-03', 'Food', '30', true),
    ],
    workingCapital: [wcRow('AR', 40), wcRow('AP', 15), wcRow('INVENTORY', 5)],
  });

  it('computes the daily series from the ledger', async () => {
    const engine = new MetricsEngine({ ledger, now });
    expect(await engine.computeCashFlow('2025-26')).toEqual([
      { date: '2025-01-02', balance: 150 },
      { date: '2025-01-03', balance: 120 },
    ]);
  });

  it('reports the current cash position', async () => {
    const engine = new MetricsEngine({ ledger, now });
    expect(await engine.currentCashPosition('2025-26')).toBe(120);
  });

  it('adds net working capital to the cash position', async () => {
    const engine = new MetricsEngine({ ledger, now });
    expect(await engine.cashPositionWithNwc('2025-26')).toBe(150);
  });

  it('plots today at opening cash for a year without transactions', async () => {
    const engine = new MetricsEngine({ ledger: new StubLedger({ years: [yearRow(500)] }), now });
    expect(await engine.computeCashFlow('2025-26')).toEqual([{ date: '2025-06-01', balance: 500 }]);
  });

  it('seeds the opening point when configured', async () => {
    const engine = new MetricsEngine({ ledger, now, config: { cashFlow: { seedOpeningPoint: true } } });
    const series = await engine.computeCashFlow('2025-26');
    expect(series[0]).toEqual({ date: '2025-01-01', balance: 100 });
    expect(await engine.currentCashPosition('2025-26')).toBe(120);
  });
});
