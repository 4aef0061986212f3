import type { LedgerEntry } from './entries.js';

function rowText(entry: LedgerEntry): string {
  return [entry.id, entry.timestamp, entry.cashier, entry.bank, entry.credit].map(String).join(' ');
}

export function filterEntries(entries: LedgerEntry[], query: string): LedgerEntry[] {
  if (query === '') {
    return entries;
  }

  const needle = query.toLowerCase();
  return entries.filter((entry) => rowText(entry).toLowerCase().includes(needle));
}

export function sortForDisplay(entries: LedgerEntry[]): LedgerEntry[] {
  return [...entries].sort((a, b) => b.id - a.id);
}
