// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { differenceInCalendarMonths, format, parseISO, subDays } from 'date-fns';
import type { DateKey } from '@clubledger/ledger';
import type { DateWindow } from './types.js';

/**
 * Last day a fiscal year may start on in the given month. February is
 * always capped at the 28th so the start date is the same every year.
 */
function maxStartDay(month: number): number {
  if (month === 2) return 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function fiscalStart(year: number, startMonth: number, startDay: number): Date {
  return new Date(year, startMonth - 1, Math.min(startDay, maxStartDay(startMonth)));
}

/**
 * The financial year containing `today`, as `[start, end)`.
 *
 * ```ts
 * currentFiscalYearWindow(9, 1, new Date(2025, 2, 10));
 * // { start: '2024-09-01', end: '2025-09-01' }
 * ```
 */
export function currentFiscalYearWindow(
  startMonth: number,
  startDay: number,
  today: Date,
): DateWindow {
  const thisYear = today.getFullYear();
  const startThisYear = fiscalStart(thisYear, startMonth, startDay);
  const todayKey = format(today, 'yyyy-MM-dd');
  const startThisYearKey = format(startThisYear, 'yyyy-MM-dd');

  if (todayKey >= startThisYearKey) {
    return {
      start: startThisYearKey,
      end: format(fiscalStart(thisYear + 1, startMonth, startDay), 'yyyy-MM-dd'),
    };
  }
  return {
    start: format(fiscalStart(thisYear - 1, startMonth, startDay), 'yyyy-MM-dd'),
    end: startThisYearKey,
  };
}

/**
 * Number of calendar months touched by `[start, end)`; 0 for an empty range.
 *
 * `monthsInRange('2025-01-15', '2025-03-01')` is 2 (January and February).
 */
export function monthsInRange(start: DateKey, end: DateKey): number {
  if (end <= start) return 0;
  const lastDay = subDays(parseISO(end), 1);
  return differenceInCalendarMonths(lastDay, parseISO(start)) + 1;
}

/** Whether a date key falls inside `[window.start, window.end)`. */
export function inWindow(date: DateKey, window: DateWindow): boolean {
  return date >= window.start && date < window.end;
}
