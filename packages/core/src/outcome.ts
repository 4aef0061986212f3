import type { LedgerError } from './errors.js';

export interface LedgerSuccess<T> {
  type: 'success';
  value: T;
}

export interface LedgerFailure {
  type: 'failure';
  error: LedgerError;
}

export type LedgerOutcome<T> = LedgerSuccess<T> | LedgerFailure;

export function success<T>(value: T): LedgerSuccess<T> {
  return { type: 'success', value };
}

export function failure(error: LedgerError): LedgerFailure {
  return { type: 'failure', error };
}
