import 'fastify';
import type { CashierSession, LedgerService, SessionRegistry } from '@credit-entry/core';

declare module 'fastify' {
  interface FastifyInstance {
    ledger: LedgerService;
    sessions: SessionRegistry;
  }

  interface FastifyRequest {
    cashierSession?: CashierSession;
  }
}
