// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

// ─── Enumerations ───────────────────────────────────────────────────────────

export const BudgetTypeSchema = z.enum(['income', 'year', 'semester1', 'semester2']);
export type BudgetType = z.infer<typeof BudgetTypeSchema>;

/** Budget types that count as spending; `income` is the only non-expense type. */
export const EXPENSE_BUDGET_TYPES: readonly BudgetType[] = ['semester1', 'semester2', 'year'];

export const WorkingCapitalKindSchema = z.enum(['AR', 'AP', 'INVENTORY']);
export type WorkingCapitalKind = z.infer<typeof WorkingCapitalKindSchema>;

export const KindDetailSchema = z.enum(['Member', 'Sponsor', 'Other']);
export type KindDetail = z.infer<typeof KindDetailSchema>;

/** Display name given to transactions whose category does not resolve. */
export const UNCATEGORIZED = 'Uncategorized';

// ─── Rows ───────────────────────────────────────────────────────────────────
//
// Rows are what a ledger backend hands back. Numeric columns are untrusted:
// Postgres returns NUMERIC as strings, hand-edited sheets carry blanks, and
// anything else may slip in. Normalisation into records happens in
// normalize.ts, never in the backends.

export type NumericInput = number | string | null | undefined;
export type DateInput = string | Date | null | undefined;
export type FlagInput = boolean | string | number | null | undefined;

/** Calendar date in `YYYY-MM-DD` form. */
export type DateKey = string;

export interface BudgetYearRow {
  readonly year_label: string;
  readonly opening_cash: NumericInput;
  readonly savings_target: NumericInput;
  readonly sort_order: NumericInput;
}

export interface BudgetEntryRow {
  readonly id: string;
  readonly year_label: string;
  readonly category_name: string;
  readonly budget_type: string;
  readonly budget: NumericInput;
}

/** A transaction with its category id already resolved to a display name. */
export interface TransactionRow {
  readonly id: string;
  readonly year_label: string;
  readonly txn_date: DateInput;
  readonly category: string | null;
  readonly description: string | null;
  readonly amount: NumericInput;
  readonly is_expense: FlagInput;
}

export interface WorkingCapitalRow {
  readonly id: string;
  readonly book_year_label: string | null;
  readonly kind: string;
  readonly kind_detail: string | null;
  readonly member_username: string | null;
  readonly amount: NumericInput;
  readonly entry_date: DateInput;
  readonly number_of_pieces: NumericInput;
  readonly description: string | null;
}

// ─── Records ────────────────────────────────────────────────────────────────

export interface BudgetEntry {
  readonly id: string;
  readonly yearLabel: string;
  readonly categoryName: string;
  /** `null` when the stored value is outside the closed BudgetType set. */
  readonly budgetType: BudgetType | null;
  readonly budget: number;
}

export interface Transaction {
  readonly id: string;
  readonly yearLabel: string;
  /** `null` when the stored date could not be parsed. */
  readonly txnDate: DateKey | null;
  readonly category: string;
  readonly description: string;
  readonly amount: number;
  readonly isExpense: boolean;
}

export interface WorkingCapitalEntry {
  readonly id: string;
  readonly bookYearLabel: string | null;
  readonly kind: WorkingCapitalKind;
  readonly kindDetail: KindDetail | null;
  readonly memberUsername: string | null;
  readonly amount: number;
  readonly entryDate: DateKey | null;
  readonly numberOfPieces: number | null;
  readonly description: string;
}

// ─── Queries ────────────────────────────────────────────────────────────────

export interface WorkingCapitalFilter {
  /** Omit to read every book year. INVENTORY reads should always omit it. */
  readonly bookYearLabel?: string;
  readonly kind: WorkingCapitalKind;
}

// ─── Write inputs ───────────────────────────────────────────────────────────

/** Who is writing. Passed explicitly to every insert that stamps a user. */
export interface WriteContext {
  readonly username: string;
}

const DateKeySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
const DateValueSchema = z.union([DateKeySchema, z.date()]);

export const BudgetYearInputSchema = z.object({
  yearLabel: z.string().trim().min(1),
  openingCash: z.number().finite().default(0),
  savingsTarget: z.number().finite().default(0),
  sortOrder: z.number().int().default(0),
});
export type BudgetYearInput = z.input<typeof BudgetYearInputSchema>;

export const NewBudgetEntrySchema = z.object({
  yearLabel: z.string().trim().min(1),
  categoryName: z.string().trim().min(1),
  budgetType: BudgetTypeSchema,
  budget: z.number().finite().default(0),
});
export type NewBudgetEntry = z.input<typeof NewBudgetEntrySchema>;

export const BudgetEntryPatchSchema = z.object({
  categoryName: z.string().trim().min(1).optional(),
  budgetType: BudgetTypeSchema.optional(),
  budget: z.number().finite().optional(),
});
export type BudgetEntryPatch = z.input<typeof BudgetEntryPatchSchema>;

export const NewTransactionSchema = z.object({
  yearLabel: z.string().trim().min(1),
  txnDate: DateValueSchema,
  /** Id of the budget entry whose category this transaction books against. */
  categoryId: z.string().min(1).nullable().default(null),
  description: z.string().default(''),
  amount: z.number().finite().nonnegative('Transaction amounts are unsigned; use isExpense'),
  isExpense: z.boolean(),
});
export type NewTransaction = z.input<typeof NewTransactionSchema>;

export const NewWorkingCapitalEntrySchema = z
  .object({
    bookYearLabel: z.string().trim().min(1).nullable().default(null),
    kind: WorkingCapitalKindSchema,
    kindDetail: KindDetailSchema.nullable().default(null),
    memberUsername: z.string().min(1).nullable().default(null),
    amount: z.number().finite().nonnegative(),
    entryDate: DateValueSchema,
    numberOfPieces: z.number().int().nonnegative().nullable().default(null),
    description: z.string().default(''),
    budgetCategoryId: z.string().min(1).nullable().default(null),
  })
  .superRefine((entry, ctx) => {
    if (entry.kind !== 'INVENTORY' && entry.bookYearLabel === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bookYearLabel'],
        message: `${entry.kind} entries must belong to a book year`,
      });
    }
  });
export type NewWorkingCapitalEntry = z.input<typeof NewWorkingCapitalEntrySchema>;

export const WorkingCapitalPatchSchema = z.object({
  kindDetail: KindDetailSchema.nullable().optional(),
  memberUsername: z.string().min(1).nullable().optional(),
  amount: z.number().finite().nonnegative().optional(),
  entryDate: DateValueSchema.optional(),
  numberOfPieces: z.number().int().nonnegative().nullable().optional(),
  description: z.string().optional(),
  budgetCategoryId: z.string().min(1).nullable().optional(),
});
export type WorkingCapitalPatch = z.input<typeof WorkingCapitalPatchSchema>;
