// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { CashFlowPoint } from '../types.js';

/** Balance of the last point, or the opening cash for an empty series. */
export function currentCashFromSeries(series: readonly CashFlowPoint[], openingCash: number): number {
  return series.at(-1)?.balance ?? openingCash;
}

export function cashPositionWithNwc(currentCash: number, nwc: number): number {
  return currentCash + nwc;
}
