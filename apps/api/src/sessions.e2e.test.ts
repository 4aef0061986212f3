import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BANKS, MemoryLedgerStore, SessionRegistry } from '@credit-entry/core';
import { buildServer } from './index.js';

describe('Cashier sessions', () => {
  let sessions: SessionRegistry;
  let server: Awaited<ReturnType<typeof buildServer>>;

  beforeEach(async () => {
    sessions = new SessionRegistry({
      now: () => new Date('2024-01-15T06:30:00Z'),
      generateId: () => 'session-abc',
    });
    server = await buildServer({ store: new MemoryLedgerStore(), sessions, logger: false });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('serves health and the vocabularies without a session', async () => {
    const health = await server.inject({ method: 'GET', url: '/healthz' });
    expect(health.json()).toEqual({ status: 'ok' });

    const catalog = await server.inject({ method: 'GET', url: '/v1/catalog' });
    expect(catalog.statusCode).toBe(200);
    expect(catalog.json().cashiers).toEqual(['Adanu', 'Ejigayehu', 'Emush', 'Misrak', 'Tigist', 'Yemisrach']);
    expect(catalog.json().banks).toEqual([...BANKS]);
  });

  it('starts a session for a listed cashier', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/sessions',
      payload: { cashier: 'Yemisrach' },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({
      session_id: 'session-abc',
      cashier: 'Yemisrach',
      started_at: '2024-01-15T06:30:00.000Z',
      selected_bank: null,
      draft_credit: null,
      pending_deletion_id: null,
    });
    expect(sessions.size).toBe(1);
  });

  it('rejects cashiers outside the roster', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/sessions',
      payload: { cashier: 'Mallory' },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json().error).toBe(
      'Unknown cashier "Mallory". Expected one of: Adanu, Ejigayehu, Emush, Misrak, Tigist, Yemisrach',
    );
    expect(sessions.size).toBe(0);
  });

  it('requires a session for ledger routes', async () => {
    const missing = await server.inject({ method: 'GET', url: '/v1/entries' });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ error: 'Select a cashier to continue' });

    const unknown = await server.inject({
      method: 'GET',
      url: '/v1/entries',
      headers: { 'x-session-id': 'not-a-session' },
    });
    expect(unknown.statusCode).toBe(401);
    expect(unknown.json()).toEqual({ error: 'Session not found or already logged out' });
  });

  it('forgets the cashier and bank on log out', async () => {
    await server.inject({ method: 'POST', url: '/v1/sessions', payload: { cashier: 'Misrak' } });
    const headers = { 'x-session-id': 'session-abc' };

    await server.inject({ method: 'PUT', url: '/v1/sessions/current/bank', headers, payload: { bank: 'Dashen' } });
    const current = await server.inject({ method: 'GET', url: '/v1/sessions/current', headers });
    expect(current.json().selected_bank).toBe('Dashen');

    const logout = await server.inject({ method: 'DELETE', url: '/v1/sessions/current', headers });
    expect(logout.statusCode).toBe(204);
    expect(sessions.get('session-abc')).toBeNull();

    const after = await server.inject({ method: 'GET', url: '/v1/sessions/current', headers });
    expect(after.statusCode).toBe(401);
  });

  it('rejects a blank bank selection', async () => {
    await server.inject({ method: 'POST', url: '/v1/sessions', payload: { cashier: 'Misrak' } });

    const response = await server.inject({
      method: 'PUT',
      url: '/v1/sessions/current/bank',
      headers: { 'x-session-id': 'session-abc' },
      payload: { bank: '   ' },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json().error).toBe('Please select a bank.');
  });

  it('clears a pending selection on request', async () => {
    await server.inject({ method: 'POST', url: '/v1/sessions', payload: { cashier: 'Misrak' } });
    const headers = { 'x-session-id': 'session-abc' };

    const selected = await server.inject({
      method: 'PUT',
      url: '/v1/sessions/current/selection',
      headers,
      payload: { entry_id: 2 },
    });
    expect(selected.statusCode).toBe(200);

    const cleared = await server.inject({ method: 'DELETE', url: '/v1/sessions/current/selection', headers });
    expect(cleared.statusCode).toBe(204);
    expect(sessions.get('session-abc')?.pendingDeletionId).toBeNull();

    const invalid = await server.inject({
      method: 'PUT',
      url: '/v1/sessions/current/selection',
      headers,
      payload: { entry_id: 'abc' },
    });
    expect(invalid.statusCode).toBe(422);
  });
});
