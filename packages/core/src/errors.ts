/**
 * Ledger errors
 *
 * Store-facing failures leave the service as one of these, tagged by `kind`.
 */

export type LedgerErrorKind =
  | 'store_connect'
  | 'store_read'
  | 'store_write'
  | 'not_found'
  | 'invalid_entry';

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

export class StoreConnectError extends LedgerError {
  constructor(cause?: unknown) {
    super('store_connect', `Failed to connect to the ledger store: ${describeCause(cause)}`, { cause });
    this.name = 'StoreConnectError';
  }
}

export class StoreReadError extends LedgerError {
  constructor(cause?: unknown) {
    super('store_read', `Failed to load data from the ledger store: ${describeCause(cause)}`, { cause });
    this.name = 'StoreReadError';
  }
}

export type WriteOperation = 'append' | 'delete';

export class StoreWriteError extends LedgerError {
  readonly operation: WriteOperation;
  readonly details: Record<string, unknown>;

  constructor(operation: WriteOperation, details: Record<string, unknown>, cause?: unknown) {
    const verb = operation === 'append' ? 'save entry' : 'delete entry';
    super('store_write', `Failed to ${verb}: ${describeCause(cause)}`, { cause });
    this.name = 'StoreWriteError';
    this.operation = operation;
    this.details = details;
  }
}

export class EntryNotFoundError extends LedgerError {
  readonly entryId: string;

  constructor(entryId: string) {
    super('not_found', `Could not find entry ID ${entryId}.`);
    this.name = 'EntryNotFoundError';
    this.entryId = entryId;
  }
}

export type EntryField = 'cashier' | 'bank' | 'credit';

export class InvalidEntryError extends LedgerError {
  readonly field: EntryField;

  constructor(field: EntryField, message: string) {
    super('invalid_entry', message);
    this.name = 'InvalidEntryError';
    this.field = field;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined || cause === null) {
    return 'unknown error';
  }
  return String(cause);
}
