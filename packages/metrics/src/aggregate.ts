// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Money arithmetic.
 *
 * Row amounts are added as stored and each total is rounded once, to ten
 * decimal places. That clears binary float noise (ten lines of 0.1 give
 * exactly 1) while amounts below a cent still count.
 */

const MONEY_DECIMALS = 10;

export function roundMoney(value: number): number {
  return Number(value.toFixed(MONEY_DECIMALS));
}

export function sumAmounts<T>(items: Iterable<T>, amount: (item: T) => number): number {
  let total = 0;
  for (const item of items) {
    total += amount(item);
  }
  return roundMoney(total);
}

/**
 * Sum amounts per key. Items whose key is `null` are skipped. Keys keep the
 * order in which they were first seen.
 */
export function groupSum<T>(
  items: Iterable<T>,
  key: (item: T) => string | null,
  amount: (item: T) => number,
): Map<string, number> {
  const raw = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    if (k === null) continue;
    raw.set(k, (raw.get(k) ?? 0) + amount(item));
  }
  const totals = new Map<string, number>();
  for (const [k, value] of raw) {
    totals.set(k, roundMoney(value));
  }
  return totals;
}
