// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { aggregateWorkingCapital } from './metrics.js';
export type { WorkingCapitalInput } from './metrics.js';
