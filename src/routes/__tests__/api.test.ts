import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';
import { buildApp } from '../../app.js';
import { openDatabase } from '../../db/index.js';
import type { SqliteAdapter } from '../../db/sqlite.js';
import { createMetricsRoutes } from '../metrics.js';

const TEXT = 'Agreement between [NAME] and [NAME2], dated ____.';
const NOW = new Date('2024-05-01T12:00:00.000Z');

let db: SqliteAdapter;
let app: FastifyInstance;

beforeEach(async () => {
  db = openDatabase(':memory:');
  app = await buildApp({
    db,
    inference: null,
    now: () => NOW,
    generateSessionId: () => 'sess-1',
  });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  await db.close();
});

async function upload(text = TEXT, title = 'Service Agreement'): Promise<string> {
  const res = await app.inject({ method: 'POST', url: '/documents', payload: { title, text } });
  expect(res.statusCode).toBe(201);
  return res.json().document.id;
}

async function openSession(documentId: string, payload: object = {}) {
  return app.inject({ method: 'POST', url: `/documents/${documentId}/sessions`, payload });
}

async function say(text: string) {
  return app.inject({ method: 'POST', url: '/sessions/sess-1/messages', payload: { text } });
}

/* ============= Documents ============= */

describe('POST /documents', () => {
  it('stores the document and extracts its slots', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/documents',
      payload: { title: 'Service Agreement', text: TEXT },
    });

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.document.title).toBe('Service Agreement');
    expect(body.document.status).toBe('processed');
    expect(body.slots.map((s: { rawToken: string }) => s.rawToken)).toEqual([
      '[NAME]',
      '[NAME2]',
      '____',
    ]);
  });

  it('defaults the title', async () => {
    const res = await app.inject({ method: 'POST', url: '/documents', payload: { text: TEXT } });

    expect(res.json().document.title).toBe('Untitled document');
  });

  it('rejects a missing text', async () => {
    const res = await app.inject({ method: 'POST', url: '/documents', payload: { title: 'x' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'text is required', code: 'BAD_REQUEST' });
  });

  it('rejects a non-string title', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/documents',
      payload: { title: 42, text: TEXT },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('title must be a string');
  });
});

describe('document reads', () => {
  it('returns 404 for an unknown document', async () => {
    const res = await app.inject({ method: 'GET', url: '/documents/missing' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'document missing not found', code: 'NOT_FOUND' });
  });

  it('returns the document with slots and progress', async () => {
    const id = await upload();
    const res = await app.inject({ method: 'GET', url: `/documents/${id}` });

    expect(res.statusCode).toBe(200);
    expect(res.json().progress).toEqual({ filled: 0, skipped: 0, total: 3, ratio: 0 });
  });

  it('lists documents', async () => {
    const id = await upload();
    const res = await app.inject({ method: 'GET', url: '/documents' });

    expect(res.json().documents).toHaveLength(1);
    expect(res.json().documents[0]).toMatchObject({ id, slotCount: 3, filledCount: 0 });
  });

  it('filters pending slots', async () => {
    const id = await upload();
    await openSession(id);
    await say('Jane Doe');

    const res = await app.inject({ method: 'GET', url: `/documents/${id}/slots?pending=true` });
    expect(res.json().slots.map((s: { id: number }) => s.id)).toEqual([1, 2]);
  });

  it('deletes a document once', async () => {
    const id = await upload();

    expect((await app.inject({ method: 'DELETE', url: `/documents/${id}` })).statusCode).toBe(204);
    expect((await app.inject({ method: 'DELETE', url: `/documents/${id}` })).statusCode).toBe(404);
  });
});

/* ============= Conversation flow ============= */

describe('conversation flow', () => {
  it('fills a document end to end', async () => {
    const id = await upload();

    const early = await app.inject({ method: 'POST', url: `/documents/${id}/assemble` });
    expect(early.statusCode).toBe(409);
    expect(early.json().code).toBe('INCOMPLETE_DOCUMENT');
    expect(early.json().details).toEqual({ pendingSlotIds: [0, 1, 2], skippedSlotIds: [] });

    const opened = await openSession(id);
    expect(opened.statusCode).toBe(201);
    expect(opened.json().session.sessionId).toBe('sess-1');
    expect(opened.json().progress).toBe(0);
    expect(opened.json().messages[0].text).toBe('Please provide the full name for "NAME".');

    const locked = await app.inject({ method: 'POST', url: `/documents/${id}/process` });
    expect(locked.statusCode).toBe(409);
    expect(locked.json().details).toEqual({ openSessions: 1 });

    const first = await say('Jane Doe');
    expect(first.statusCode).toBe(200);
    expect(first.json().outcome).toBe('accepted');
    expect(first.json().cursorSlot.id).toBe(1);

    const bad = await say('12345');
    expect(bad.statusCode).toBe(200);
    expect(bad.json().outcome).toBe('rejected');
    expect(bad.json().rejection).toBe('a name cannot be only numbers');

    const skipped = await app.inject({ method: 'POST', url: '/sessions/sess-1/skip' });
    expect(skipped.json().outcome).toBe('skipped');
    expect(skipped.json().cursorSlot.id).toBe(2);

    const last = await say('2024-03-01');
    expect(last.json().state).toBe('complete');
    expect(last.json().progress).toBe(1);
    expect(last.json().messages.at(-1).text).toBe(
      'All done! Every placeholder has been handled and your document is ready to download.'
    );

    const assembled = await app.inject({ method: 'POST', url: `/documents/${id}/assemble` });
    expect(assembled.statusCode).toBe(200);
    expect(assembled.json()).toEqual({
      documentId: id,
      title: 'Service Agreement',
      text: 'Agreement between Jane Doe and [NAME2], dated 2024-03-01.',
    });

    const download = await app.inject({ method: 'GET', url: `/documents/${id}/download` });
    expect(download.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(download.headers['content-disposition']).toBe(
      'attachment; filename="service-agreement.txt"'
    );
    expect(download.body).toBe('Agreement between Jane Doe and [NAME2], dated 2024-03-01.');

    const doc = await app.inject({ method: 'GET', url: `/documents/${id}` });
    expect(doc.json().document.status).toBe('completed');
    expect(doc.json().progress).toEqual({ filled: 2, skipped: 1, total: 3, ratio: 1 });

    const session = await app.inject({ method: 'GET', url: '/sessions/sess-1' });
    expect(session.json().progress).toBe(1);
    expect(session.json().cursorSlot).toBeNull();
    expect(session.json().session.history).toHaveLength(11);

    const listed = await app.inject({ method: 'GET', url: `/documents/${id}/sessions` });
    expect(listed.json().sessions[0]).toMatchObject({ state: 'complete', messageCount: 11 });
  });

  it('refuses replies once the session is complete', async () => {
    const id = await upload('Signed by [NAME].');
    await openSession(id);
    await say('Jane Doe');

    const res = await app.inject({ method: 'POST', url: '/sessions/sess-1/skip' });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: 'Cannot skip while session is complete',
      code: 'INVALID_STATE',
    });
  });

  it('completes immediately for a document without placeholders', async () => {
    const id = await upload('Nothing to fill here.');
    const res = await openSession(id);

    expect(res.json().session.state).toBe('complete');
    expect(res.json().messages[0].text).toBe(
      'This document has no placeholders to fill. It is ready to download.'
    );
  });

  it('resumes an existing session id', async () => {
    const id = await upload();
    await openSession(id, { sessionId: 'sess-1' });
    const again = await openSession(id, { sessionId: 'sess-1' });

    expect(again.statusCode).toBe(200);
    expect(again.json().messages).toEqual([]);
    expect(again.json().cursorSlot.id).toBe(0);
  });

  it('refuses to bind a session id to a second document', async () => {
    const first = await upload();
    const second = await upload();
    await openSession(first);

    const res = await openSession(second);
    expect(res.statusCode).toBe(409);
    expect(res.json().code).toBe('INVALID_STATE');
  });

  it('validates the session id and message text', async () => {
    const id = await upload();

    expect((await openSession(id, { sessionId: 'no spaces allowed' })).statusCode).toBe(400);

    await openSession(id);
    const res = await app.inject({
      method: 'POST',
      url: '/sessions/sess-1/messages',
      payload: { text: 7 },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('text is required');
  });

  it('returns 404 for unknown sessions and documents', async () => {
    const reply = await app.inject({
      method: 'POST',
      url: '/sessions/ghost/messages',
      payload: { text: 'hi' },
    });
    expect(reply.statusCode).toBe(404);
    expect(reply.json()).toEqual({ error: 'session ghost not found', code: 'NOT_FOUND' });

    const opened = await openSession('missing');
    expect(opened.statusCode).toBe(404);
  });

  it('allows re-extraction once every session is complete', async () => {
    const id = await upload('Signed by [NAME].');
    await openSession(id);
    await say('Jane Doe');

    const res = await app.inject({ method: 'POST', url: `/documents/${id}/process` });
    expect(res.statusCode).toBe(200);
    expect(res.json().slots[0].status).toBe('pending');
  });
});

/* ============= Observability ============= */

describe('observability', () => {
  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('healthy');
    expect(res.json().checks.database.status).toBe('up');
  });

  it('answers the health checks', async () => {
    expect((await app.inject({ method: 'GET', url: '/health/live' })).json()).toEqual({ alive: true });
    expect((await app.inject({ method: 'GET', url: '/health/ready' })).json()).toEqual({ ready: true });
  });

  it('echoes the request id', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { 'x-request-id': 'req-123' },
    });

    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('exposes prometheus metrics', async () => {
    await upload();
    const res = await app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('# TYPE blankfill_slots_extracted_total counter');
    expect(res.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
  });

  it('answers 500 when metrics cannot be collected', async () => {
    class FailingRegistry extends Registry {
      metrics(): Promise<string> {
        return Promise.reject(new Error('collector failed'));
      }
    }
    const bare = Fastify();
    bare.register(createMetricsRoutes(new FailingRegistry()));

    const res = await bare.inject({ method: 'GET', url: '/metrics' });
    await bare.close();

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'metrics unavailable' });
  });
});
