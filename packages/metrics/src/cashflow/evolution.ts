// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { format, parseISO, subDays } from 'date-fns';
import type { DateKey, Transaction } from '@clubledger/ledger';
import { roundMoney } from '../aggregate.js';
import type { CashFlowPoint } from '../types.js';

export interface CashFlowOptions {
  /** Date of the single fallback point when there are no transactions. */
  readonly today: DateKey;
  /** Prepend the day before the first transaction at opening cash. */
  readonly seedOpeningPoint?: boolean;
}

/** Cash moves out on expenses and in on everything else. */
export function signedFlow(txn: Transaction): number {
  return txn.isExpense ? -txn.amount : txn.amount;
}

/**
 * Daily closing balances, oldest first.
 *
 * Same-day transactions are netted into one point. Transactions without a
 * usable date are left out. With nothing to plot the series is a single
 * point at `today` holding the opening cash, so charts never get an empty
 * series.
 */
export function buildCashFlowSeries(
  openingCash: number,
  transactions: readonly Transaction[],
  options: CashFlowOptions,
): CashFlowPoint[] {
  const daily = new Map<DateKey, number>();
  for (const txn of transactions) {
    if (txn.txnDate === null) continue;
    daily.set(txn.txnDate, (daily.get(txn.txnDate) ?? 0) + signedFlow(txn));
  }

  if (daily.size === 0) {
    return [{ date: options.today, balance: openingCash }];
  }

  const days = [...daily.keys()].sort();
  const series: CashFlowPoint[] = [];
  let running = openingCash;
  for (const day of days) {
    running += daily.get(day) ?? 0;
    series.push({ date: day, balance: roundMoney(running) });
  }

  const first = days[0];
  if (options.seedOpeningPoint === true && first !== undefined) {
    const dayBefore = format(subDays(parseISO(first), 1), 'yyyy-MM-dd');
    series.unshift({ date: dayBefore, balance: openingCash });
  }
  return series;
}
