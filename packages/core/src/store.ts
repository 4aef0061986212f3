import type { RawRow, RowValues } from './entries.js';

/**
 * Row-oriented backing table. Positions are sheet-style row numbers: the
 * header is row 1 and data rows start at 2.
 */
export interface LedgerStore {
  connect(): Promise<void>;
  fetchAllRows(): Promise<RawRow[]>;
  appendRow(values: RowValues): Promise<void>;
  findRowByFirstColumn(value: string): Promise<number | null>;
  deleteRow(position: number): Promise<void>;
}
