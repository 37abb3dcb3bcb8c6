// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { DuplicateBudgetEntryError, RecordNotFoundError } from '../errors.js';
import {
  BudgetEntryPatchSchema,
  BudgetYearInputSchema,
  NewBudgetEntrySchema,
  NewTransactionSchema,
  NewWorkingCapitalEntrySchema,
  UNCATEGORIZED,
  WorkingCapitalPatchSchema,
  type BudgetEntryPatch,
  type BudgetEntryRow,
  type BudgetYearInput,
  type BudgetYearRow,
  type NewBudgetEntry,
  type NewTransaction,
  type NewWorkingCapitalEntry,
  type NumericInput,
  type TransactionRow,
  type WorkingCapitalFilter,
  type WorkingCapitalPatch,
  type WorkingCapitalRow,
  type WriteContext,
} from '../types.js';
import { toTimeLabel } from '../normalize.js';
import { parseInput, requireDateKey } from '../validate.js';
import type { LedgerAccess } from './interface.js';

/**
 * Minimal Postgres client interface.
 *
 * This avoids a hard dependency on any specific Postgres library. Callers
 * provide a pool or client that satisfies this contract; `createPostgresClient`
 * wraps a node-postgres Pool.
 */
export interface PostgresClientLike {
  query<T extends object = Record<string, unknown>>(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: T[]; rowCount: number | null }>;
  end?(): Promise<void>;
}

/** Configuration for the Postgres ledger. */
export interface PostgresLedgerConfig {
  /** A Postgres client or pool satisfying the PostgresClientLike interface. */
  client: PostgresClientLike;
  /** Schema name for all ledger tables. Defaults to "public". */
  schema?: string;
}

/** SQLSTATE for unique_violation. */
const UNIQUE_VIOLATION = '23505';
/** SQLSTATE for foreign_key_violation. */
const FOREIGN_KEY_VIOLATION = '23503';

function sqlState(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function isUniqueViolation(error: unknown): boolean {
  return sqlState(error) === UNIQUE_VIOLATION;
}

/** References a write may point at; `null` where the write sets none. */
interface WriteReferences {
  readonly yearLabel: string | null;
  readonly budgetEntryId: string | null;
}

/**
 * Map a foreign_key_violation to the RecordNotFoundError the in-memory
 * backend raises for the same input. Constraints keep their default
 * `<table>_<column>_fkey` names, so a name ending in `category_id_fkey`
 * points at a budget entry and anything else at a budget year.
 */
function missingReference(error: unknown, references: WriteReferences): RecordNotFoundError | null {
  if (sqlState(error) !== FOREIGN_KEY_VIOLATION) return null;
  const constraint =
    typeof error === 'object' && error !== null && 'constraint' in error && typeof error.constraint === 'string'
      ? error.constraint
      : '';
  if (constraint.endsWith('category_id_fkey') && references.budgetEntryId !== null) {
    return new RecordNotFoundError('budget entry', references.budgetEntryId);
  }
  if (references.yearLabel !== null) {
    return new RecordNotFoundError('budget year', references.yearLabel);
  }
  if (references.budgetEntryId !== null) {
    return new RecordNotFoundError('budget entry', references.budgetEntryId);
  }
  return null;
}

const BUDGET_ENTRY_COLUMNS = 'id, year_label, category_name, budget_type, budget';
const WORKING_CAPITAL_COLUMNS = `id, book_year_label, kind, kind_detail, member_username, amount,
  entry_date::text AS entry_date, number_of_pieces, description`;

/**
 * Postgres-backed implementation of LedgerAccess.
 *
 * Table layout (all within the configured schema):
 *   budget_years     — one row per planning year (UPSERT by label)
 *   budget_entries   — budget lines, unique per (year, category, type)
 *   transactions     — cash movements, category resolved by LEFT JOIN
 *   working_capital  — AR, AP and inventory rows
 *
 * NUMERIC columns come back from node-postgres as strings and DATE columns
 * are selected as `::text`; turning them into numbers and date keys is left
 * to the normalisation step.
 *
 * All queries use parameterised placeholders ($1, $2, ...), never string
 * concatenation of values.
 */
export class PostgresLedger implements LedgerAccess {
  readonly #client: PostgresClientLike;
  readonly #schema: string;

  constructor(config: PostgresLedgerConfig) {
    this.#client = config.client;
    this.#schema = config.schema ?? 'public';
  }

  #table(name: string): string {
    return `"${this.#schema}"."${name}"`;
  }

  // -------------------------------------------------------------------------
  // Budget years
  // -------------------------------------------------------------------------

  async listBudgetYears(): Promise<readonly BudgetYearRow[]> {
    const result = await this.#client.query<BudgetYearRow>(
      `SELECT year_label, opening_cash, savings_target, sort_order
       FROM ${this.#table('budget_years')}
       ORDER BY sort_order ASC, year_label ASC`,
    );
    return result.rows;
  }

  async getBudgetYear(yearLabel: string): Promise<BudgetYearRow | null> {
    const result = await this.#client.query<BudgetYearRow>(
      `SELECT year_label, opening_cash, savings_target, sort_order
       FROM ${this.#table('budget_years')}
       WHERE year_label = $1`,
      [yearLabel],
    );
    return result.rows[0] ?? null;
  }

  async getOpeningCash(yearLabel: string): Promise<NumericInput> {
    return (await this.getBudgetYear(yearLabel))?.opening_cash ?? null;
  }

  async getSavingsTarget(yearLabel: string): Promise<NumericInput> {
    return (await this.getBudgetYear(yearLabel))?.savings_target ?? null;
  }

  async upsertBudgetYear(input: BudgetYearInput): Promise<BudgetYearRow> {
    const parsed = parseInput(BudgetYearInputSchema, input);
    const result = await this.#client.query<BudgetYearRow>(
      `INSERT INTO ${this.#table('budget_years')} (year_label, opening_cash, savings_target, sort_order)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (year_label) DO UPDATE SET
         opening_cash = EXCLUDED.opening_cash,
         savings_target = EXCLUDED.savings_target,
         sort_order = EXCLUDED.sort_order
       RETURNING year_label, opening_cash, savings_target, sort_order`,
      [parsed.yearLabel, parsed.openingCash, parsed.savingsTarget, parsed.sortOrder],
    );
    return this.#single(result.rows, 'budget year', parsed.yearLabel);
  }

  // -------------------------------------------------------------------------
  // Budget entries
  // -------------------------------------------------------------------------

  async listBudgetEntries(yearLabel: string): Promise<readonly BudgetEntryRow[]> {
    const result = await this.#client.query<BudgetEntryRow>(
      `SELECT ${BUDGET_ENTRY_COLUMNS}
       FROM ${this.#table('budget_entries')}
       WHERE year_label = $1
       ORDER BY created_at ASC, id ASC`,
      [yearLabel],
    );
    return result.rows;
  }

  async addBudgetEntry(input: NewBudgetEntry): Promise<BudgetEntryRow> {
    const parsed = parseInput(NewBudgetEntrySchema, input);
    try {
      const result = await this.#client.query<BudgetEntryRow>(
        `INSERT INTO ${this.#table('budget_entries')} (id, year_label, category_name, budget_type, budget)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${BUDGET_ENTRY_COLUMNS}`,
        [crypto.randomUUID(), parsed.yearLabel, parsed.categoryName, parsed.budgetType, parsed.budget],
      );
      return this.#single(result.rows, 'budget entry', parsed.categoryName);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateBudgetEntryError(parsed.yearLabel, parsed.categoryName, parsed.budgetType);
      }
      throw missingReference(error, { yearLabel: parsed.yearLabel, budgetEntryId: null }) ?? error;
    }
  }

  async updateBudgetEntry(id: string, patch: BudgetEntryPatch): Promise<BudgetEntryRow> {
    const parsed = parseInput(BudgetEntryPatchSchema, patch);
    const assignments: string[] = [];
    const params: unknown[] = [id];
    let paramIndex = 2;

    if (parsed.categoryName !== undefined) {
      assignments.push(`category_name = $${paramIndex++}`);
      params.push(parsed.categoryName);
    }
    if (parsed.budgetType !== undefined) {
      assignments.push(`budget_type = $${paramIndex++}`);
      params.push(parsed.budgetType);
    }
    if (parsed.budget !== undefined) {
      assignments.push(`budget = $${paramIndex++}`);
      params.push(parsed.budget);
    }

    const sql =
      assignments.length === 0
        ? `SELECT ${BUDGET_ENTRY_COLUMNS} FROM ${this.#table('budget_entries')} WHERE id = $1`
        : `UPDATE ${this.#table('budget_entries')} SET ${assignments.join(', ')}
           WHERE id = $1
           RETURNING ${BUDGET_ENTRY_COLUMNS}`;

    try {
      const result = await this.#client.query<BudgetEntryRow>(sql, params);
      return this.#single(result.rows, 'budget entry', id);
    } catch (error) {
      if (isUniqueViolation(error)) {
        const current = await this.#client.query<BudgetEntryRow>(
          `SELECT ${BUDGET_ENTRY_COLUMNS} FROM ${this.#table('budget_entries')} WHERE id = $1`,
          [id],
        );
        const row = this.#single(current.rows, 'budget entry', id);
        throw new DuplicateBudgetEntryError(
          row.year_label,
          parsed.categoryName ?? row.category_name,
          parsed.budgetType ?? row.budget_type,
        );
      }
      throw error;
    }
  }

  async deleteBudgetEntry(id: string): Promise<void> {
    const result = await this.#client.query(
      `DELETE FROM ${this.#table('budget_entries')} WHERE id = $1`,
      [id],
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new RecordNotFoundError('budget entry', id);
    }
  }

  // -------------------------------------------------------------------------
  // Transactions
  // -------------------------------------------------------------------------

  async listTransactions(yearLabel: string): Promise<readonly TransactionRow[]> {
    const result = await this.#client.query<TransactionRow>(
      `SELECT t.id, t.year_label, t.txn_date::text AS txn_date,
              COALESCE(b.category_name, $2) AS category,
              t.description, t.amount, t.is_expense
       FROM ${this.#table('transactions')} t
       LEFT JOIN ${this.#table('budget_entries')} b ON b.id = t.category_id
       WHERE t.year_label = $1
       ORDER BY t.txn_date ASC, t.inserted_at ASC, t.id ASC`,
      [yearLabel, UNCATEGORIZED],
    );
    return result.rows;
  }

  async insertTransaction(input: NewTransaction, context: WriteContext): Promise<TransactionRow> {
    const parsed = parseInput(NewTransactionSchema, input);
    const txnDate = requireDateKey(parsed.txnDate, 'txnDate');
    const id = crypto.randomUUID();

    try {
      await this.#client.query(
        `INSERT INTO ${this.#table('transactions')}
         (id, year_label, txn_date, time_label, category_id, description, amount, is_expense, inserted_by_username)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          id,
          parsed.yearLabel,
          txnDate,
          toTimeLabel(txnDate),
          parsed.categoryId,
          parsed.description,
          parsed.amount,
          parsed.isExpense,
          context.username,
        ],
      );
    } catch (error) {
      throw missingReference(error, { yearLabel: parsed.yearLabel, budgetEntryId: parsed.categoryId }) ?? error;
    }

    const result = await this.#client.query<TransactionRow>(
      `SELECT t.id, t.year_label, t.txn_date::text AS txn_date,
              COALESCE(b.category_name, $2) AS category,
              t.description, t.amount, t.is_expense
       FROM ${this.#table('transactions')} t
       LEFT JOIN ${this.#table('budget_entries')} b ON b.id = t.category_id
       WHERE t.id = $1`,
      [id, UNCATEGORIZED],
    );
    return this.#single(result.rows, 'transaction', id);
  }

  async deleteTransactions(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.#client.query(
      `DELETE FROM ${this.#table('transactions')} WHERE id = ANY($1::text[])`,
      [[...ids]],
    );
    return result.rowCount ?? 0;
  }

  // -------------------------------------------------------------------------
  // Working capital
  // -------------------------------------------------------------------------

  async listWorkingCapital(filter: WorkingCapitalFilter): Promise<readonly WorkingCapitalRow[]> {
    const conditions = ['kind = $1'];
    const params: unknown[] = [filter.kind];
    if (filter.bookYearLabel !== undefined) {
      conditions.push('book_year_label = $2');
      params.push(filter.bookYearLabel);
    }

    const result = await this.#client.query<WorkingCapitalRow>(
      `SELECT ${WORKING_CAPITAL_COLUMNS}
       FROM ${this.#table('working_capital')}
       WHERE ${conditions.join(' AND ')}
       ORDER BY entry_date ASC, id ASC`,
      params,
    );
    return result.rows;
  }

  async insertWorkingCapitalEntry(
    input: NewWorkingCapitalEntry,
    context: WriteContext,
  ): Promise<WorkingCapitalRow> {
    const parsed = parseInput(NewWorkingCapitalEntrySchema, input);
    const entryDate = requireDateKey(parsed.entryDate, 'entryDate');
    try {
      const result = await this.#client.query<WorkingCapitalRow>(
        `INSERT INTO ${this.#table('working_capital')}
         (id, book_year_label, kind, kind_detail, member_username, amount, entry_date,
          number_of_pieces, description, budget_category_id, inserted_by_username)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         RETURNING ${WORKING_CAPITAL_COLUMNS}`,
        [
          crypto.randomUUID(),
          parsed.bookYearLabel,
          parsed.kind,
          parsed.kindDetail,
          parsed.memberUsername,
          parsed.amount,
          entryDate,
          parsed.numberOfPieces,
          parsed.description,
          parsed.budgetCategoryId,
          context.username,
        ],
      );
      return this.#single(result.rows, 'working capital entry', parsed.kind);
    } catch (error) {
      throw (
        missingReference(error, {
          yearLabel: parsed.bookYearLabel,
          budgetEntryId: parsed.budgetCategoryId,
        }) ?? error
      );
    }
  }

  async updateWorkingCapitalEntry(id: string, patch: WorkingCapitalPatch): Promise<WorkingCapitalRow> {
    const parsed = parseInput(WorkingCapitalPatchSchema, patch);
    const columns: Array<[string, unknown]> = [];
    if (parsed.kindDetail !== undefined) columns.push(['kind_detail', parsed.kindDetail]);
    if (parsed.memberUsername !== undefined) columns.push(['member_username', parsed.memberUsername]);
    if (parsed.amount !== undefined) columns.push(['amount', parsed.amount]);
    if (parsed.entryDate !== undefined) {
      columns.push(['entry_date', requireDateKey(parsed.entryDate, 'entryDate')]);
    }
    if (parsed.numberOfPieces !== undefined) columns.push(['number_of_pieces', parsed.numberOfPieces]);
    if (parsed.description !== undefined) columns.push(['description', parsed.description]);
    if (parsed.budgetCategoryId !== undefined) {
      columns.push(['budget_category_id', parsed.budgetCategoryId]);
    }

    const sql =
      columns.length === 0
        ? `SELECT ${WORKING_CAPITAL_COLUMNS} FROM ${this.#table('working_capital')} WHERE id = $1`
        : `UPDATE ${this.#table('working_capital')}
           SET ${columns.map(([column], index) => `${column} = $${index + 2}`).join(', ')}
           WHERE id = $1
           RETURNING ${WORKING_CAPITAL_COLUMNS}`;

    try {
      const result = await this.#client.query<WorkingCapitalRow>(sql, [
        id,
        ...columns.map(([, value]) => value),
      ]);
      return this.#single(result.rows, 'working capital entry', id);
    } catch (error) {
      throw missingReference(error, { yearLabel: null, budgetEntryId: parsed.budgetCategoryId ?? null }) ?? error;
    }
  }

  async deleteWorkingCapitalEntry(id: string): Promise<void> {
    const result = await this.#client.query(
      `DELETE FROM ${this.#table('working_capital')} WHERE id = $1`,
      [id],
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new RecordNotFoundError('working capital entry', id);
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    const schema = this.#schema;

    await this.#client.query(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);

    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS "${schema}".budget_years (
        year_label TEXT PRIMARY KEY,
        opening_cash NUMERIC(14, 2) NOT NULL DEFAULT 0,
        savings_target NUMERIC(14, 2) NOT NULL DEFAULT 0,
        sort_order INTEGER NOT NULL DEFAULT 0
      )
    `);

    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS "${schema}".budget_entries (
        id TEXT PRIMARY KEY,
        year_label TEXT NOT NULL REFERENCES "${schema}".budget_years(year_label) ON DELETE CASCADE,
        category_name TEXT NOT NULL,
        budget_type TEXT NOT NULL,
        budget NUMERIC(14, 2) NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        UNIQUE (year_label, category_name, budget_type)
      )
    `);

    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS "${schema}".transactions (
        id TEXT PRIMARY KEY,
        year_label TEXT NOT NULL REFERENCES "${schema}".budget_years(year_label) ON DELETE CASCADE,
        txn_date DATE NOT NULL,
        time_label TEXT NOT NULL,
        category_id TEXT REFERENCES "${schema}".budget_entries(id) ON DELETE SET NULL,
        description TEXT NOT NULL DEFAULT '',
        amount NUMERIC(14, 2) NOT NULL CHECK (amount >= 0),
        is_expense BOOLEAN NOT NULL,
        inserted_by_username TEXT,
        inserted_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    await this.#client.query(`
      CREATE INDEX IF NOT EXISTS idx_transactions_year_date
        ON "${schema}".transactions(year_label, txn_date)
    `);

    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS "${schema}".working_capital (
        id TEXT PRIMARY KEY,
        book_year_label TEXT REFERENCES "${schema}".budget_years(year_label) ON DELETE CASCADE,
        kind TEXT NOT NULL,
        kind_detail TEXT,
        member_username TEXT,
        amount NUMERIC(14, 2) NOT NULL CHECK (amount >= 0),
        entry_date DATE NOT NULL,
        number_of_pieces INTEGER,
        description TEXT NOT NULL DEFAULT '',
        budget_category_id TEXT REFERENCES "${schema}".budget_entries(id) ON DELETE SET NULL,
        inserted_by_username TEXT
      )
    `);

    await this.#client.query(`
      CREATE INDEX IF NOT EXISTS idx_working_capital_kind_year
        ON "${schema}".working_capital(kind, book_year_label)
    `);
  }

  async disconnect(): Promise<void> {
    if (this.#client.end !== undefined) {
      await this.#client.end();
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.#client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  #single<T>(rows: readonly T[], entity: string, id: string): T {
    const row = rows[0];
    if (row === undefined) {
      throw new RecordNotFoundError(entity, id);
    }
    return row;
  }
}
