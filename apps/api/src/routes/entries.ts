import type { FastifyInstance } from 'fastify';
import {
  filterEntries,
  savedMessage,
  sortForDisplay,
  type LedgerEntry,
  type RejectedRow,
} from '@credit-entry/core';
import { entryQuerySchema, submitEntrySchema } from '../validators.js';
import { errorBody, statusFor } from './errors.js';

interface EntryListReply {
  entries: LedgerEntry[];
  total: number;
  /** Malformed rows, still listed so they can be found and deleted. */
  rejected_rows: RejectedRow[];
  warning?: string;
}

export async function registerEntryRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { q?: string }; Reply: EntryListReply | { error: string } }>(
    '/v1/entries',
    async (request, reply) => {
      const query = entryQuerySchema.safeParse(request.query);
      if (!query.success) {
        reply.code(400).send({ error: 'Invalid query parameters' });
        return;
      }

      const outcome = await app.ledger.readSnapshot();
      if (outcome.type === 'failure') {
        app.log.warn({ err: outcome.error }, 'Failed to load ledger entries');
        reply.send({ entries: [], total: 0, rejected_rows: [], warning: outcome.error.message });
        return;
      }

      const { entries, rejected } = outcome.value;
      reply.send({
        entries: sortForDisplay(filterEntries(entries, query.data.q ?? '')),
        total: entries.length,
        rejected_rows: rejected,
      });
    },
  );

  app.post<{ Body: unknown }>('/v1/entries', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    const parsed = submitEntrySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid entry payload', details: parsed.error.issues });
      return;
    }

    const bank = session.selectedBank;
    if (!bank) {
      reply.code(422).send({ error: 'Please select a bank.' });
      return;
    }

    const credit = parsed.data.credit;
    if (credit === null || credit === undefined) {
      reply.code(422).send({ error: 'Please enter a credit amount.' });
      return;
    }

    const outcome = await app.ledger.appendEntry(session.cashier, bank, credit);
    if (outcome.type === 'failure') {
      const { error } = outcome;
      if (error.kind === 'store_write') {
        session.keepDraft(credit);
        app.log.error({ err: error }, 'Failed to save entry');
        reply.code(statusFor(error)).send({ ...errorBody(error), draft: { bank, credit } });
        return;
      }
      reply.code(statusFor(error)).send(errorBody(error));
      return;
    }

    session.clearDraft();
    const entry = outcome.value;
    request.log.info({ entryId: entry.id, cashier: entry.cashier, bank: entry.bank }, 'Entry saved');
    reply.code(201).send({ entry, message: savedMessage(entry) });
  });
}
