import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import { LedgerService } from '@credit-entry/core';
import { PostgresLedgerStore } from './postgres.js';

describe('PostgresLedgerStore', () => {
  let pool: Pool;
  let store: PostgresLedgerStore;

  beforeEach(async () => {
    const mem = newDb({ noAstCoverageCheck: true });
    const { Pool: MemPool } = mem.adapters.createPg();
    pool = new MemPool();
    store = new PostgresLedgerStore(pool);
    await store.connect();
  });

  afterEach(async () => {
    await pool.end();
  });

  it('appends rows and reads them back in insertion order', async () => {
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);
    await store.appendRow(['2', '2024-01-10 08:05:00', 'Misrak', 'CBE', '12.5']);

    expect(await store.fetchAllRows()).toEqual([
      { ID: '1', Timestamp: '2024-01-10 08:00:00', Cashier: 'Tigist', Bank: 'Abay', Credit: '100' },
      { ID: '2', Timestamp: '2024-01-10 08:05:00', Cashier: 'Misrak', Bank: 'CBE', Credit: '12.5' },
    ]);
  });

  it('locates rows by their first column using sheet positions', async () => {
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);
    await store.appendRow(['3', '2024-01-10 08:05:00', 'Misrak', 'CBE', '12.5']);

    expect(await store.findRowByFirstColumn('1')).toBe(2);
    expect(await store.findRowByFirstColumn('3')).toBe(3);
    expect(await store.findRowByFirstColumn('2')).toBeNull();
  });

  it('deletes exactly the row at a position', async () => {
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);
    await store.appendRow(['2', '2024-01-10 08:05:00', 'Misrak', 'CBE', '12.5']);
    await store.appendRow(['3', '2024-01-10 08:10:00', 'Emush', 'Nib', '40']);

    await store.deleteRow(3);

    const ids = (await store.fetchAllRows()).map((row) => row.ID);
    expect(ids).toEqual(['1', '3']);
    expect(await store.findRowByFirstColumn('3')).toBe(3);
  });

  it('refuses positions outside the data rows', async () => {
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);

    await expect(store.deleteRow(1)).rejects.toThrow('Row 1 is out of range');
    await expect(store.deleteRow(5)).rejects.toThrow('Row 5 is out of range');
    expect(await store.fetchAllRows()).toHaveLength(1);
  });

  it('leaves existing rows alone when connecting again', async () => {
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);
    await store.connect();

    expect(await store.fetchAllRows()).toHaveLength(1);
  });

  it('backs the ledger service end to end', async () => {
    const service = await LedgerService.open(store);
    await store.appendRow(['1', '2024-01-10 08:00:00', 'Tigist', 'Abay', '100']);
    await store.appendRow(['3', '2024-01-11 08:15:00', 'Emush', 'Nib', '50']);

    const appended = await service.appendEntry('Misrak', 'Abay', 250.5, new Date(2024, 0, 15, 9, 30, 5));
    expect(appended).toEqual({
      type: 'success',
      value: { id: 4, timestamp: '2024-01-15 09:30:05', cashier: 'Misrak', bank: 'Abay', credit: 250.5 },
    });

    expect((await service.deleteEntry(3)).type).toBe('success');

    const listed = await service.listEntries();
    expect(listed.type === 'success' && listed.value.map((entry) => entry.id)).toEqual([1, 4]);
  });
});
