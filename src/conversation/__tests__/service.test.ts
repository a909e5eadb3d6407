import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase } from '../../db/index.js';
import type { SqliteAdapter } from '../../db/sqlite.js';
import { SlotRegistry } from '../../extraction/registry.js';
import { createDocumentStore, type DocumentStore } from '../../store/documents.js';
import { createConversationStore } from '../../store/sessions.js';
import { InvalidStateError, NotFoundError } from '../../errors.js';
import { ConversationService } from '../service.js';

const TEXT = 'Agreement between [NAME] and [NAME2], dated ____.';

let db: SqliteAdapter;
let documents: DocumentStore;
let service: ConversationService;
let documentId: string;

beforeEach(async () => {
  db = openDatabase(':memory:');
  documents = createDocumentStore(db);
  service = new ConversationService({
    db,
    documents,
    sessions: createConversationStore(db),
    generateSessionId: () => 'sess-1',
  });
  const doc = await documents.create({ title: 'Lease', text: TEXT });
  documentId = doc.id;
  await documents.replaceSlots(documentId, SlotRegistry.build(TEXT).list());
});

afterEach(async () => {
  await db.close();
});

describe('ConversationService', () => {
  it('creates a session and prompts for the first slot', async () => {
    const opened = await service.openSession(documentId);

    expect(opened.created).toBe(true);
    expect(opened.session.state).toBe('awaiting_input');
    expect(opened.cursorSlot?.id).toBe(0);
    expect(opened.turn?.outcome).toBe('prompted');
  });

  it('persists filled values to the document', async () => {
    await service.openSession(documentId);
    await service.reply('sess-1', 'Jane Doe');

    const slots = await documents.getSlots(documentId);
    expect(slots[0].value).toBe('Jane Doe');
    expect(slots[0].status).toBe('filled');
  });

  it('serializes concurrent replies on one session', async () => {
    await service.openSession(documentId);

    const [first, second] = await Promise.all([
      service.reply('sess-1', 'Jane Doe'),
      service.reply('sess-1', 'John Roe'),
    ]);

    expect(first.outcome).toBe('accepted');
    expect(second.outcome).toBe('accepted');
    const slots = await documents.getSlots(documentId);
    expect(slots.map((s) => s.value)).toEqual(['Jane Doe', 'John Roe', null]);
  });

  it('resumes a stored session with its history', async () => {
    await service.openSession(documentId);
    await service.skip('sess-1');

    const view = await service.getSession('sess-1');
    expect(view.session.history).toHaveLength(3);
    expect(view.cursorSlot?.id).toBe(1);
    expect(view.progress).toBeCloseTo(1 / 3);
  });

  it('moves a waiting session on once another session fills its slot', async () => {
    const doc = await documents.create({ title: 'Short', text: 'Signed by [NAME].' });
    await documents.replaceSlots(doc.id, SlotRegistry.build('Signed by [NAME].').list());
    await service.openSession(doc.id, 'a');
    await service.openSession(doc.id, 'b');
    await service.reply('b', 'Jane Doe');

    const view = await service.getSession('a');
    expect(view.session.state).toBe('complete');
    expect(view.progress).toBe(1);
    expect(view.cursorSlot).toBeNull();
    expect(view.session.history.slice(-2).map((m) => m.text)).toEqual([
      '"NAME" was already answered in another session.',
      'All done! Every placeholder has been handled and your document is ready to download.',
    ]);
  });

  it('does not apply a reply aimed at a slot another session filled', async () => {
    await service.openSession(documentId, 'a');
    await service.openSession(documentId, 'b');
    await service.reply('b', 'Jane Doe');

    const turn = await service.reply('a', 'John Roe');
    expect(turn.outcome).toBe('prompted');
    expect(turn.cursorSlot?.id).toBe(1);

    const slots = await documents.getSlots(documentId);
    expect(slots.map((s) => s.value)).toEqual(['Jane Doe', null, null]);
  });

  it('throws NotFoundError for unknown ids', async () => {
    await expect(service.getSession('ghost')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.openSession('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('throws InvalidStateError after completion', async () => {
    await service.openSession(documentId);
    await service.skip('sess-1');
    await service.skip('sess-1');
    await service.skip('sess-1');

    await expect(service.reply('sess-1', 'late')).rejects.toBeInstanceOf(InvalidStateError);
  });
});
