// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all @clubledger errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class LedgerError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the ledger backend itself fails: connectivity, a malformed
 * schema, a rejected query. These are the only failures the metrics engine
 * lets through to its callers.
 *
 * The original failure is kept on `cause`.
 */
export class LedgerAccessError extends LedgerError {
  /** The access-layer operation that failed, e.g. `listTransactions`. */
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('LEDGER_ACCESS_FAILED', `Ledger operation "${operation}" failed: ${detail}`);
    this.name = 'LedgerAccessError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Thrown when a write would create a second budget line for the same
 * (year, category, budget type) triple.
 */
export class DuplicateBudgetEntryError extends LedgerError {
  readonly yearLabel: string;
  readonly categoryName: string;
  readonly budgetType: string;

  constructor(yearLabel: string, categoryName: string, budgetType: string) {
    super(
      'DUPLICATE_BUDGET_ENTRY',
      `Budget year "${yearLabel}" already has a ${budgetType} line for category "${categoryName}".`,
    );
    this.name = 'DuplicateBudgetEntryError';
    this.yearLabel = yearLabel;
    this.categoryName = categoryName;
    this.budgetType = budgetType;
  }
}

/** Thrown by update/delete operations that target an id the ledger does not hold. */
export class RecordNotFoundError extends LedgerError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super('RECORD_NOT_FOUND', `No ${entity} with id "${id}".`);
    this.name = 'RecordNotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Thrown when a write input fails validation.
 *
 * `details` carries one `path: message` entry per Zod issue.
 */
export class InvalidInputError extends LedgerError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_INPUT', `Ledger input is invalid: ${details.join('; ')}`);
    this.name = 'InvalidInputError';
    this.details = details;
  }
}

/**
 * Thrown when configuration is structurally or semantically invalid.
 *
 * The `details` array matches the format of Zod's `ZodError.issues` so
 * callers can forward them directly to structured loggers.
 */
export class InvalidConfigError extends LedgerError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
