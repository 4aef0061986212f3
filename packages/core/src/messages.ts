import type { LedgerEntry } from './entries.js';

const creditFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCredit(credit: number): string {
  return creditFormat.format(credit);
}

export function savedMessage(entry: LedgerEntry): string {
  return `Saved: ID ${entry.id} | ${entry.bank} - ${formatCredit(entry.credit)}`;
}

export function deletedMessage(entryId: number | string): string {
  return `Entry ID ${entryId} deleted successfully.`;
}

export function selectionPrompt(entryId: number | string): string {
  return `You have selected Entry ID ${entryId} for deletion.`;
}
