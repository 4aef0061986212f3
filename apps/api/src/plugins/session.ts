import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { SESSION_HEADER } from '../config.js';

const PUBLIC_ROUTES = new Set(['/healthz', '/v1/catalog', '/v1/sessions']);

async function resolveSession(request: FastifyRequest, reply: FastifyReply) {
  const routeUrl = request.routeOptions?.url;
  if (!routeUrl || PUBLIC_ROUTES.has(routeUrl)) {
    return;
  }

  const header = request.headers[SESSION_HEADER];
  if (!header) {
    reply.code(401).send({ error: 'Select a cashier to continue' });
    return reply;
  }

  const session = request.server.sessions.get(String(header));
  if (!session) {
    reply.code(401).send({ error: 'Session not found or already logged out' });
    return reply;
  }

  request.cashierSession = session;
  return;
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('preHandler', resolveSession);
});
