import { serialize } from './arbiter.js';
import { isCashier, isKnownBank, unknownCashierMessage } from './catalog.js';
import {
  formatTimestamp,
  nextId,
  parseRows,
  snapshotIds,
  toRowValues,
  type LedgerEntry,
  type LedgerSnapshot,
} from './entries.js';
import {
  EntryNotFoundError,
  InvalidEntryError,
  StoreConnectError,
  StoreReadError,
  StoreWriteError,
} from './errors.js';
import { failure, success, type LedgerOutcome } from './outcome.js';
import type { LedgerStore } from './store.js';

/** Subset of the pino logger interface the service writes to. */
export interface LedgerLogger {
  warn(obj: object, msg?: string): void;
}

export interface LedgerServiceOptions {
  now?: () => Date;
  logger?: LedgerLogger;
}

export class LedgerService {
  private readonly store: LedgerStore;
  private readonly now: () => Date;
  private readonly logger: LedgerLogger | null;

  constructor(store: LedgerStore, options: LedgerServiceOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? null;
  }

  /**
   * Connects the store and returns a service bound to it.
   *
   * @throws StoreConnectError when the store cannot be reached
   */
  static async open(store: LedgerStore, options: LedgerServiceOptions = {}): Promise<LedgerService> {
    try {
      await store.connect();
    } catch (error) {
      throw new StoreConnectError(error);
    }
    return new LedgerService(store, options);
  }

  async readSnapshot(): Promise<LedgerOutcome<LedgerSnapshot>> {
    try {
      return success(await this.fetchSnapshot());
    } catch (error) {
      return failure(new StoreReadError(error));
    }
  }

  async listEntries(): Promise<LedgerOutcome<LedgerEntry[]>> {
    const outcome = await this.readSnapshot();
    if (outcome.type === 'failure') {
      return outcome;
    }
    return success(outcome.value.entries);
  }

  nextId(rows: ReadonlyArray<{ id: number | string }>): number {
    return nextId(rows);
  }

  async appendEntry(
    cashier: string,
    bank: string,
    credit: number,
    now: Date = this.now(),
  ): Promise<LedgerOutcome<LedgerEntry>> {
    const invalid = this.validate(cashier, bank, credit);
    if (invalid) {
      return failure(invalid);
    }

    if (!isKnownBank(bank)) {
      this.logger?.warn({ bank }, 'Recording entry for a bank outside the known list');
    }

    return serialize(this.store, async () => {
      try {
        const snapshot = await this.fetchSnapshot();
        const entry: LedgerEntry = {
          id: nextId(snapshotIds(snapshot)),
          timestamp: formatTimestamp(now),
          cashier,
          bank,
          credit,
        };

        await this.store.appendRow(toRowValues(entry));
        return success(entry);
      } catch (error) {
        return failure(new StoreWriteError('append', { cashier, bank, credit }, error));
      }
    });
  }

  async deleteEntry(id: number | string): Promise<LedgerOutcome<true>> {
    const key = String(id).trim();

    return serialize(this.store, async () => {
      try {
        const position = await this.store.findRowByFirstColumn(key);
        if (position === null) {
          return failure(new EntryNotFoundError(key));
        }

        await this.store.deleteRow(position);
        return success(true as const);
      } catch (error) {
        return failure(new StoreWriteError('delete', { entryId: key }, error));
      }
    });
  }

  private async fetchSnapshot(): Promise<LedgerSnapshot> {
    const rows = await this.store.fetchAllRows();
    const snapshot = parseRows(rows);

    if (snapshot.rejected.length > 0) {
      this.logger?.warn(
        { rejected: snapshot.rejected.map((row) => ({ position: row.position, defects: row.defects })) },
        'Ledger contains rows that could not be parsed',
      );
    }

    return snapshot;
  }

  private validate(cashier: string, bank: string, credit: number): InvalidEntryError | null {
    if (!isCashier(cashier)) {
      return new InvalidEntryError('cashier', unknownCashierMessage(cashier));
    }
    if (bank.trim() === '') {
      return new InvalidEntryError('bank', 'Please select a bank.');
    }
    if (!Number.isFinite(credit) || credit <= 0) {
      return new InvalidEntryError('credit', 'Credit must be a number greater than zero.');
    }
    return null;
  }
}
