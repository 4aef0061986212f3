import type { FastifyInstance } from 'fastify';
import { BANKS, CASHIERS } from '@credit-entry/core';

export async function registerCatalogRoutes(app: FastifyInstance) {
  app.get('/v1/catalog', async () => ({
    cashiers: [...CASHIERS],
    banks: [...BANKS],
  }));
}
