import { createMemoryStore, type LedgerStore } from '@credit-entry/core';
import { getPool } from '../db.js';
import { PostgresLedgerStore } from './postgres.js';

type StoreFactory = () => LedgerStore;

const factories = new Map<string, StoreFactory>();

export function registerStore(name: string, factory: StoreFactory): void {
  factories.set(name.toLowerCase(), factory);
}

export function getStore(name: string): LedgerStore {
  const factory = factories.get(name.toLowerCase());
  if (!factory) {
    throw new Error(`Ledger store "${name}" not registered`);
  }
  return factory();
}

registerStore('postgres', () => new PostgresLedgerStore(getPool()));
registerStore('memory', createMemoryStore);
