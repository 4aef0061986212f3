import { HEADERS, rowFromValues, type RawRow, type RowValues } from './entries.js';
import type { LedgerStore } from './store.js';

export class MemoryLedgerStore implements LedgerStore {
  private readonly rows: string[][];

  constructor(seed: ReadonlyArray<readonly string[]> = []) {
    this.rows = [[...HEADERS], ...seed.map((values) => [...values])];
  }

  async connect(): Promise<void> {
    return;
  }

  async fetchAllRows(): Promise<RawRow[]> {
    return this.rows.slice(1).map((values) => rowFromValues(values));
  }

  async appendRow(values: RowValues): Promise<void> {
    this.rows.push([...values]);
  }

  async findRowByFirstColumn(value: string): Promise<number | null> {
    const index = this.rows.findIndex((values, rowIndex) => rowIndex > 0 && values[0] === value);
    return index === -1 ? null : index + 1;
  }

  async deleteRow(position: number): Promise<void> {
    if (!Number.isInteger(position) || position < 2 || position > this.rows.length) {
      throw new Error(`Row ${position} is out of range`);
    }
    this.rows.splice(position - 1, 1);
  }

  get size(): number {
    return this.rows.length - 1;
  }
}

export function createMemoryStore(): LedgerStore {
  return new MemoryLedgerStore();
}
