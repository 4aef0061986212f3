import type { Pool } from 'pg';
import { rowFromValues, type LedgerStore, type RawRow, type RowValues } from '@credit-entry/core';
import { withTransaction } from '../db.js';

type LedgerRowRecord = {
  row_no: number;
  id: string | null;
  ts: string | null;
  cashier: string | null;
  bank: string | null;
  credit: string | null;
};

/**
 * Sheet-shaped ledger kept in one Postgres table. Every cell is text and rows
 * keep insertion order through `row_no`; positions are derived from that
 * order, with the header counted as row 1.
 */
export class PostgresLedgerStore implements LedgerStore {
  private readonly pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async connect(): Promise<void> {
    await this.pool.query('SELECT 1');
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ledger_rows (
        row_no SERIAL PRIMARY KEY,
        id TEXT NOT NULL DEFAULT '',
        ts TEXT NOT NULL DEFAULT '',
        cashier TEXT NOT NULL DEFAULT '',
        bank TEXT NOT NULL DEFAULT '',
        credit TEXT NOT NULL DEFAULT ''
      );
    `);
  }

  async fetchAllRows(): Promise<RawRow[]> {
    const result = await this.pool.query<LedgerRowRecord>(
      `SELECT row_no, id, ts, cashier, bank, credit
         FROM ledger_rows
     ORDER BY row_no`,
    );

    return result.rows.map((row) =>
      rowFromValues([row.id ?? '', row.ts ?? '', row.cashier ?? '', row.bank ?? '', row.credit ?? '']),
    );
  }

  async appendRow(values: RowValues): Promise<void> {
    await this.pool.query(
      `INSERT INTO ledger_rows (id, ts, cashier, bank, credit)
       VALUES ($1, $2, $3, $4, $5)`,
      values,
    );
  }

  async findRowByFirstColumn(value: string): Promise<number | null> {
    const result = await this.pool.query<Pick<LedgerRowRecord, 'row_no' | 'id'>>(
      `SELECT row_no, id FROM ledger_rows ORDER BY row_no`,
    );

    const index = result.rows.findIndex((row) => row.id === value);
    return index === -1 ? null : index + 2;
  }

  async deleteRow(position: number): Promise<void> {
    await withTransaction(async (client) => {
      const result = await client.query<Pick<LedgerRowRecord, 'row_no'>>(
        `SELECT row_no FROM ledger_rows ORDER BY row_no`,
      );

      const target = result.rows[position - 2];
      if (!Number.isInteger(position) || !target) {
        throw new Error(`Row ${position} is out of range`);
      }

      await client.query(`DELETE FROM ledger_rows WHERE row_no = $1`, [target.row_no]);
    }, this.pool);
  }
}
