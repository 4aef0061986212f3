import type { FastifyInstance } from 'fastify';
import { InvalidEntryError, deletedMessage, isKnownBank, selectionPrompt } from '@credit-entry/core';
import { selectBankSchema, selectRowSchema, startSessionSchema } from '../validators.js';
import { errorBody, statusFor } from './errors.js';

export async function registerSessionRoutes(app: FastifyInstance) {
  app.post<{ Body: unknown }>('/v1/sessions', async (request, reply) => {
    const parsed = startSessionSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid session payload', details: parsed.error.issues });
      return;
    }

    try {
      const session = app.sessions.start(parsed.data.cashier);
      request.log.info({ sessionId: session.id, cashier: session.cashier }, 'Cashier session started');
      reply.code(201).send(session.toView());
    } catch (error) {
      if (error instanceof InvalidEntryError) {
        reply.code(422).send({ error: error.message });
        return;
      }
      throw error;
    }
  });

  app.get('/v1/sessions/current', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    reply.send(session.toView());
  });

  app.delete('/v1/sessions/current', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    app.sessions.end(session.id);
    request.log.info({ sessionId: session.id, cashier: session.cashier }, 'Cashier logged out');
    reply.code(204).send();
  });

  app.put<{ Body: unknown }>('/v1/sessions/current/bank', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    const parsed = selectBankSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Please select a bank.', details: parsed.error.issues });
      return;
    }

    const { bank } = parsed.data;
    if (!isKnownBank(bank)) {
      request.log.warn({ bank }, 'Bank selected outside the known list');
    }

    session.selectBank(bank);
    reply.send(session.toView());
  });

  app.put<{ Body: unknown }>('/v1/sessions/current/selection', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    const parsed = selectRowSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422).send({ error: 'Invalid selection payload', details: parsed.error.issues });
      return;
    }

    const entryId = parsed.data.entry_id;
    session.stageDeletion(entryId);
    reply.send({ entry_id: entryId, message: selectionPrompt(entryId) });
  });

  app.delete('/v1/sessions/current/selection', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    session.clearDeletion();
    reply.code(204).send();
  });

  app.post('/v1/sessions/current/selection/confirm', async (request, reply) => {
    const session = request.cashierSession;
    if (!session) {
      reply.code(500).send({ error: 'Session context missing' });
      return;
    }

    const entryId = session.pendingDeletionId;
    if (entryId === null) {
      reply.code(409).send({ error: 'No entry selected.' });
      return;
    }

    const outcome = await app.ledger.deleteEntry(entryId);
    if (outcome.type === 'failure') {
      const { error } = outcome;
      if (error.kind === 'not_found') {
        session.clearDeletion();
      } else {
        app.log.error({ err: error }, 'Failed to delete entry');
      }
      reply.code(statusFor(error)).send(errorBody(error));
      return;
    }

    session.clearDeletion();
    request.log.info({ entryId, cashier: session.cashier }, 'Entry deleted');
    reply.send({ message: deletedMessage(entryId) });
  });
}
