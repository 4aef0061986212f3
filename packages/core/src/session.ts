import { randomUUID } from 'crypto';
import { isCashier, unknownCashierMessage, type Cashier } from './catalog.js';
import { InvalidEntryError } from './errors.js';

export interface SessionView {
  session_id: string;
  cashier: Cashier;
  started_at: string;
  selected_bank: string | null;
  draft_credit: number | null;
  pending_deletion_id: number | null;
}

/**
 * Per-cashier form state that has to survive between requests: the chosen
 * bank, a credit amount kept after a failed save, and the row picked for
 * deletion.
 */
export class CashierSession {
  readonly id: string;
  readonly cashier: Cashier;
  readonly startedAt: Date;

  private bank: string | null = null;
  private draft: number | null = null;
  private pendingDeletion: number | null = null;
  private lastSeen: Date;

  constructor(id: string, cashier: Cashier, startedAt: Date) {
    this.id = id;
    this.cashier = cashier;
    this.startedAt = startedAt;
    this.lastSeen = startedAt;
  }

  get lastSeenAt(): Date {
    return this.lastSeen;
  }

  touch(at: Date): void {
    this.lastSeen = at;
  }

  get selectedBank(): string | null {
    return this.bank;
  }

  get draftCredit(): number | null {
    return this.draft;
  }

  get pendingDeletionId(): number | null {
    return this.pendingDeletion;
  }

  selectBank(bank: string): void {
    this.bank = bank;
  }

  keepDraft(credit: number): void {
    this.draft = credit;
  }

  clearDraft(): void {
    this.draft = null;
  }

  stageDeletion(entryId: number): void {
    this.pendingDeletion = entryId;
  }

  clearDeletion(): void {
    this.pendingDeletion = null;
  }

  toView(): SessionView {
    return {
      session_id: this.id,
      cashier: this.cashier,
      started_at: this.startedAt.toISOString(),
      selected_bank: this.bank,
      draft_credit: this.draft,
      pending_deletion_id: this.pendingDeletion,
    };
  }
}

export const DEFAULT_SESSION_IDLE_MS = 8 * 60 * 60 * 1000;

export interface SessionRegistryOptions {
  now?: () => Date;
  generateId?: () => string;
  /** Sessions untouched for longer than this are dropped. */
  idleTimeoutMs?: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, CashierSession>();
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly idleTimeoutMs: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_SESSION_IDLE_MS;
  }

  start(cashier: string): CashierSession {
    if (!isCashier(cashier)) {
      throw new InvalidEntryError('cashier', unknownCashierMessage(cashier));
    }

    const now = this.now();
    this.evictIdle(now);

    const session = new CashierSession(this.generateId(), cashier, now);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): CashierSession | null {
    const now = this.now();
    this.evictIdle(now);

    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }
    session.touch(now);
    return session;
  }

  end(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictIdle(now: Date): void {
    const cutoff = now.getTime() - this.idleTimeoutMs;
    for (const [id, session] of this.sessions) {
      if (session.lastSeenAt.getTime() < cutoff) {
        this.sessions.delete(id);
      }
    }
  }
}
