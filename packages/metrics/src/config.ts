// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { parseConfig } from '@clubledger/ledger';

// ---------------------------------------------------------------------------
// Fiscal year
// ---------------------------------------------------------------------------

/**
 * First day of the financial year. Days past the end of the month are
 * clamped when the window is built, so `{ startMonth: 2, startDay: 31 }`
 * starts on 28 February.
 */
const FiscalYearConfigSchema = z.object({
  startMonth: z.number().int().min(1).max(12).default(1),
  startDay: z.number().int().min(1).max(31).default(1),
});

export type FiscalYearConfig = z.infer<typeof FiscalYearConfigSchema>;

// ---------------------------------------------------------------------------
// Cash flow
// ---------------------------------------------------------------------------

const CashFlowConfigSchema = z.object({
  /**
   * Prepend an opening point (the day before the first transaction, at
   * opening cash) so charts show where the balance started from.
   */
  seedOpeningPoint: z.boolean().default(false),
});

export type CashFlowConfig = z.infer<typeof CashFlowConfigSchema>;

// ---------------------------------------------------------------------------
// Metrics config
// ---------------------------------------------------------------------------

export const MetricsConfigSchema = z.object({
  fiscalYear: FiscalYearConfigSchema.default({}),
  cashFlow: CashFlowConfigSchema.default({}),
  /** ISO 4217 code written into report headers. */
  currency: z
    .string()
    .regex(/^[A-Z]{3}$/, 'currency must be a three-letter ISO 4217 code')
    .default('EUR'),
});

export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type MetricsConfigInput = z.input<typeof MetricsConfigSchema>;

/**
 * Parse and validate a raw metrics config object.
 *
 * @throws {InvalidConfigError} With one `path: message` entry per issue.
 */
export function parseMetricsConfig(raw: unknown = {}): MetricsConfig {
  return parseConfig(MetricsConfigSchema, raw);
}
