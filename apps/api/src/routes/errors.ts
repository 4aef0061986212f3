import type { LedgerError, LedgerErrorKind } from '@credit-entry/core';
import { StoreWriteError } from '@credit-entry/core';

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  invalid_entry: 422,
  not_found: 404,
  store_read: 503,
  store_write: 502,
  store_connect: 503,
};

export function statusFor(error: LedgerError): number {
  return STATUS_BY_KIND[error.kind];
}

export function errorBody(error: LedgerError): Record<string, unknown> {
  if (error instanceof StoreWriteError) {
    return { error: error.message, operation: error.operation, details: error.details };
  }
  return { error: error.message };
}
