import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase } from '../../db/index.js';
import type { SqliteAdapter } from '../../db/sqlite.js';
import type { ChatMessage, ConversationSession } from '../../conversation/types.js';
import { createDocumentStore } from '../documents.js';
import { createConversationStore, type ConversationStore } from '../sessions.js';

const CREATED = '2024-05-01T12:00:00.000Z';
const LATER = '2024-05-01T12:05:00.000Z';

let db: SqliteAdapter;
let store: ConversationStore;
let documentId: string;

function message(role: ChatMessage['role'], text: string, timestamp = CREATED): ChatMessage {
  return { role, text, timestamp, relatedSlotId: 0 };
}

function newSession(sessionId: string): ConversationSession {
  return {
    sessionId,
    documentId,
    state: 'awaiting_input',
    cursor: 0,
    history: [message('assistant', 'Please provide the full name for "NAME".')],
    createdAt: CREATED,
    updatedAt: CREATED,
  };
}

beforeEach(async () => {
  db = openDatabase(':memory:');
  store = createConversationStore(db);
  const doc = await createDocumentStore(db).create({ title: 'Lease', text: 'Signed by [NAME].' });
  documentId = doc.id;
});

afterEach(async () => {
  await db.close();
});

/* ============= create / get ============= */

describe('ConversationStore create/get', () => {
  it('stores a session with its initial history', async () => {
    const session = newSession('sess-1');
    await store.create(session);

    expect(await store.get('sess-1')).toEqual(session);
  });

  it('returns null for an unknown session', async () => {
    expect(await store.get('nope')).toBeNull();
  });
});

/* ============= save ============= */

describe('ConversationStore save', () => {
  it('appends new messages after the stored history', async () => {
    const session = newSession('sess-1');
    await store.create(session);

    const appended = [
      message('user', 'Jane Doe', LATER),
      message('assistant', 'Thanks. "NAME" is set to Jane Doe.', LATER),
    ];
    session.history.push(...appended);
    session.state = 'complete';
    session.cursor = null;
    session.updatedAt = LATER;
    await store.save(session, appended);

    const loaded = await store.get('sess-1');
    expect(loaded?.state).toBe('complete');
    expect(loaded?.cursor).toBeNull();
    expect(loaded?.updatedAt).toBe(LATER);
    expect(loaded?.history.map((m) => m.text)).toEqual([
      'Please provide the full name for "NAME".',
      'Jane Doe',
      'Thanks. "NAME" is set to Jane Doe.',
    ]);
  });
});

/* ============= listByDocument / countOpen ============= */

describe('ConversationStore listing', () => {
  it('lists sessions of a document with message counts', async () => {
    await store.create(newSession('sess-1'));

    const sessions = await store.listByDocument(documentId);
    expect(sessions).toEqual([
      {
        sessionId: 'sess-1',
        documentId,
        state: 'awaiting_input',
        cursor: 0,
        messageCount: 1,
        createdAt: CREATED,
        updatedAt: CREATED,
      },
    ]);
  });

  it('counts only sessions that are not complete', async () => {
    await store.create(newSession('sess-1'));
    const done = newSession('sess-2');
    done.state = 'complete';
    done.cursor = null;
    await store.create(done);

    expect(await store.countOpen(documentId)).toBe(1);
  });

  it('drops sessions with their document', async () => {
    await store.create(newSession('sess-1'));
    await createDocumentStore(db).delete(documentId);

    expect(await store.get('sess-1')).toBeNull();
  });
});
