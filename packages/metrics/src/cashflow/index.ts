// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { buildCashFlowSeries, signedFlow } from './evolution.js';
export type { CashFlowOptions } from './evolution.js';
export { currentCashFromSeries, cashPositionWithNwc } from './position.js';
