import Fastify, { type FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';
import { LedgerService, SessionRegistry, StoreConnectError, type LedgerStore } from '@credit-entry/core';
import { CONFIG } from './config.js';
import { closePool } from './db.js';
import sessionPlugin from './plugins/session.js';
import { registerCatalogRoutes } from './routes/catalog.js';
import { registerEntryRoutes } from './routes/entries.js';
import { registerSessionRoutes } from './routes/sessions.js';
import { getStore } from './stores/index.js';

export interface BuildServerOptions {
  store?: LedgerStore;
  sessions?: SessionRegistry;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const logger = options.logger ?? CONFIG.env !== 'test';
  const app = Fastify({ logger: logger ? { level: CONFIG.logLevel } : false });

  const store = options.store ?? getStore(CONFIG.ledgerStore);
  const ledger = await LedgerService.open(store, { logger: app.log });

  app.decorate('ledger', ledger);
  app.decorate('sessions', options.sessions ?? new SessionRegistry({ idleTimeoutMs: CONFIG.sessionIdleMs }));

  app.addHook('onClose', async () => {
    await closePool();
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  await app.register(sessionPlugin);

  await registerCatalogRoutes(app);
  await registerSessionRoutes(app);
  await registerEntryRoutes(app);

  return app;
}

export function logStartupFailure(logger: Pick<FastifyBaseLogger, 'fatal'>, err: unknown): void {
  if (err instanceof StoreConnectError) {
    logger.fatal({ err }, 'Ledger store unavailable');
    return;
  }
  logger.fatal({ err }, 'Failed to start API');
}

async function start() {
  const app = await buildServer();
  const port = CONFIG.port;
  const host = '0.0.0.0';

  try {
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err, 'Failed to start API');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const bootLogger = pino({ level: CONFIG.logLevel });
  start().catch((err) => {
    logStartupFailure(bootLogger, err);
    process.exit(1);
  });
}
