// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { PostgresLedger } from '../src/access/postgres.js';
import { DuplicateBudgetEntryError, RecordNotFoundError } from '../src/errors.js';

type Handler = (text: string, values: unknown[] | undefined) => { rows: object[]; rowCount?: number };

function fakeClient(handler: Handler = () => ({ rows: [] })) {
  const query = vi.fn();
  query.mockImplementation(async (text: string, values?: unknown[]) => {
    const result = handler(text, values);
    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  });
  const end = vi.fn().mockResolvedValue(undefined);
  return { client: { query, end }, query, end };
}

describe('PostgresLedger', () => {
  describe('connect', () => {
    it('creates the schema and the four ledger tables', async () => {
      const { client, query } = fakeClient();
      await new PostgresLedger({ client, schema: 'club' }).connect();

      const statements = query.mock.calls.map((call) => String(call[0]));
      expect(statements[0]).toBe('CREATE SCHEMA IF NOT EXISTS "club"');
      const tables = statements.filter((text) => text.includes('CREATE TABLE IF NOT EXISTS'));
      expect(tables).toHaveLength(4);
      expect(statements.some((text) => text.includes('UNIQUE (year_label, category_name, budget_type)'))).toBe(true);
    });
  });

  describe('reads', () => {
    it('selects transactions with text dates and a resolved category', async () => {
      const row = {
        id: 't1',
        year_label: '2025-26',
        txn_date: '2025-01-02',
        category: 'Food',
        description: '',
        amount: '20.00',
        is_expense: true,
      };
      const { client, query } = fakeClient(() => ({ rows: [row] }));
      const ledger = new PostgresLedger({ client, schema: 'club' });

      expect(await ledger.listTransactions('2025-26')).toEqual([row]);
      const [text, values] = query.mock.calls[0]!;
      expect(text).toContain('t.txn_date::text AS txn_date');
      expect(text).toContain('LEFT JOIN "club"."budget_entries" b ON b.id = t.category_id');
      expect(values).toEqual(['2025-26', 'Uncategorized']);
    });

    it('does not scope working capital by year when no year is given', async () => {
      const { client, query } = fakeClient();
      const ledger = new PostgresLedger({ client });

      await ledger.listWorkingCapital({ kind: 'INVENTORY' });
      await ledger.listWorkingCapital({ kind: 'AR', bookYearLabel: '2025-26' });

      const [inventorySql, inventoryValues] = query.mock.calls[0]!;
      expect(inventorySql).not.toContain('book_year_label =');
      expect(inventoryValues).toEqual(['INVENTORY']);
      const [arSql, arValues] = query.mock.calls[1]!;
      expect(arSql).toContain('WHERE kind = $1 AND book_year_label = $2');
      expect(arValues).toEqual(['AR', '2025-26']);
    });

    it('returns null opening cash for an unknown year', async () => {
      const { client } = fakeClient();
      expect(await new PostgresLedger({ client }).getOpeningCash('1999-00')).toBeNull();
    });

    it('returns the stored opening cash as read', async () => {
      const { client } = fakeClient(() => ({
        rows: [{ year_label: '2025-26', opening_cash: '150.00', savings_target: '0', sort_order: 1 }],
      }));
      expect(await new PostgresLedger({ client }).getOpeningCash('2025-26')).toBe('150.00');
    });
  });

  describe('writes', () => {
    it('maps a unique violation to DuplicateBudgetEntryError', async () => {
      const { client } = fakeClient(() => {
        throw Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
      });
      const ledger = new PostgresLedger({ client });
      await expect(
        ledger.addBudgetEntry({ yearLabel: '2025-26', categoryName: 'Food', budgetType: 'year', budget: 10 }),
      ).rejects.toBeInstanceOf(DuplicateBudgetEntryError);
    });

    it('passes other driver errors through unchanged', async () => {
      const failure = new Error('connection terminated');
      const { client } = fakeClient(() => {
        throw failure;
      });
      const ledger = new PostgresLedger({ client });
      await expect(
        ledger.addBudgetEntry({ yearLabel: '2025-26', categoryName: 'Food', budgetType: 'year' }),
      ).rejects.toBe(failure);
    });

    describe('foreign key violations', () => {
      const violating = (constraint: string) =>
        fakeClient(() => {
          throw Object.assign(new Error('insert or update violates foreign key constraint'), {
            code: '23503',
            constraint,
          });
        });

      it('reports an unknown budget year', async () => {
        const { client } = violating('budget_entries_year_label_fkey');
        const error = await new PostgresLedger({ client })
          .addBudgetEntry({ yearLabel: '2030-31', categoryName: 'Food', budgetType: 'year' })
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(RecordNotFoundError);
        expect(error).toMatchObject({ entity: 'budget year', id: '2030-31' });
      });

      it('reports an unknown category on a transaction', async () => {
        const { client } = violating('transactions_category_id_fkey');
        const error = await new PostgresLedger({ client })
          .insertTransaction(
            { yearLabel: '2025-26', txnDate: '2025-03-04', categoryId: 'gone', amount: 5, isExpense: true },
            { username: 'treasurer' },
          )
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(RecordNotFoundError);
        expect(error).toMatchObject({ entity: 'budget entry', id: 'gone' });
      });

      it('reports an unknown book year on a working capital entry', async () => {
        const { client } = violating('working_capital_book_year_label_fkey');
        const error = await new PostgresLedger({ client })
          .insertWorkingCapitalEntry(
            { bookYearLabel: '2030-31', kind: 'AR', amount: 5, entryDate: '2025-03-04', budgetCategoryId: 'b1' },
            { username: 'treasurer' },
          )
          .catch((e: unknown) => e);
        expect(error).toMatchObject({ entity: 'budget year', id: '2030-31' });
      });

      it('reports an unknown category on a working capital update', async () => {
        const { client } = violating('working_capital_budget_category_id_fkey');
        await expect(
          new PostgresLedger({ client }).updateWorkingCapitalEntry('w1', { budgetCategoryId: 'gone' }),
        ).rejects.toMatchObject({ entity: 'budget entry', id: 'gone' });
      });
    });

    it('stamps the month bucket and the inserting user on transactions', async () => {
      const stored = {
        id: 'generated',
        year_label: '2025-26',
        txn_date: '2025-03-04',
        category: 'Uncategorized',
        description: 'Pizza',
        amount: '12.00',
        is_expense: true,
      };
      const { client, query } = fakeClient((text) =>
        text.trimStart().startsWith('INSERT') ? { rows: [], rowCount: 1 } : { rows: [stored] },
      );
      const ledger = new PostgresLedger({ client });

      const row = await ledger.insertTransaction(
        { yearLabel: '2025-26', txnDate: '2025-03-04', description: 'Pizza', amount: 12, isExpense: true },
        { username: 'treasurer' },
      );

      expect(row).toEqual(stored);
      const values = query.mock.calls[0]![1] as unknown[];
      expect(values.slice(1)).toEqual(['2025-26', '2025-03-04', '2025-03', null, 'Pizza', 12, true, 'treasurer']);
    });

    it('throws RecordNotFoundError when a delete matches nothing', async () => {
      const { client } = fakeClient(() => ({ rows: [], rowCount: 0 }));
      const ledger = new PostgresLedger({ client });
      await expect(ledger.deleteBudgetEntry('missing')).rejects.toBeInstanceOf(RecordNotFoundError);
      await expect(ledger.deleteWorkingCapitalEntry('missing')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('skips the query when deleting an empty id list', async () => {
      const { client, query } = fakeClient();
      expect(await new PostgresLedger({ client }).deleteTransactions([])).toBe(0);
      expect(query).not.toHaveBeenCalled();
    });

    it('returns the driver row count for bulk transaction deletes', async () => {
      const { client, query } = fakeClient(() => ({ rows: [], rowCount: 2 }));
      expect(await new PostgresLedger({ client }).deleteTransactions(['a', 'b', 'c'])).toBe(2);
      expect(query.mock.calls[0]![1]).toEqual([['a', 'b', 'c']]);
    });

    it('builds an update from the patched columns only', async () => {
      const { client, query } = fakeClient(() => ({
        rows: [{ id: 'b1', year_label: '2025-26', category_name: 'Food', budget_type: 'year', budget: '30' }],
      }));
      await new PostgresLedger({ client }).updateBudgetEntry('b1', { budget: 30 });
      const [text, values] = query.mock.calls[0]!;
      expect(text).toContain('SET budget = $2');
      expect(values).toEqual(['b1', 30]);
    });
  });

  describe('lifecycle', () => {
    it('reports unhealthy when the health check query fails', async () => {
      const { client } = fakeClient(() => {
        throw new Error('down');
      });
      expect(await new PostgresLedger({ client }).isHealthy()).toBe(false);
    });

    it('ends the client on disconnect', async () => {
      const { client, end } = fakeClient();
      await new PostgresLedger({ client }).disconnect();
      expect(end).toHaveBeenCalledOnce();
    });
  });
});
