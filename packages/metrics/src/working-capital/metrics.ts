// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { WorkingCapitalEntry } from '@clubledger/ledger';
import { groupSum, sumAmounts } from '../aggregate.js';
import type { WorkingCapitalMetrics } from '../types.js';

export interface WorkingCapitalInput {
  /** Receivables of the book year. */
  readonly receivables: readonly WorkingCapitalEntry[];
  /** Payables of the book year. */
  readonly payables: readonly WorkingCapitalEntry[];
  /** All inventory, regardless of book year. */
  readonly inventory: readonly WorkingCapitalEntry[];
}

/**
 * Combine AR, AP and inventory into net working capital.
 *
 * Receivables without a recognised `kindDetail` count towards `totalAr` but
 * towards none of the member/sponsor/other buckets.
 */
export function aggregateWorkingCapital(input: WorkingCapitalInput): WorkingCapitalMetrics {
  const amount = (entry: WorkingCapitalEntry): number => entry.amount;
  const arByDetail = groupSum(input.receivables, (entry) => entry.kindDetail, amount);

  const totalAr = sumAmounts(input.receivables, amount);
  const totalAp = sumAmounts(input.payables, amount);
  const totalInventory = sumAmounts(input.inventory, amount);

  return {
    totalAr,
    arMember: arByDetail.get('Member') ?? 0,
    arSponsor: arByDetail.get('Sponsor') ?? 0,
    arOther: arByDetail.get('Other') ?? 0,
    totalAp,
    totalInventory,
    nwc: totalAr + totalInventory - totalAp,
  };
}
