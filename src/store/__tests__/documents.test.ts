import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase } from '../../db/index.js';
import type { SqliteAdapter } from '../../db/sqlite.js';
import { SlotRegistry } from '../../extraction/registry.js';
import { createDocumentStore, isDocumentStatus, type DocumentStore } from '../documents.js';

const TEXT = 'Agreement between [NAME] and [NAME2], dated ____.';

let db: SqliteAdapter;
let store: DocumentStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = createDocumentStore(db);
});

afterEach(async () => {
  await db.close();
});

/* ============= isDocumentStatus ============= */

describe('isDocumentStatus', () => {
  it('accepts known statuses', () => {
    expect(isDocumentStatus('uploaded')).toBe(true);
    expect(isDocumentStatus('processed')).toBe(true);
    expect(isDocumentStatus('completed')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isDocumentStatus('done')).toBe(false);
  });
});

/* ============= Documents ============= */

describe('DocumentStore documents', () => {
  it('creates and reads back a document', async () => {
    const created = await store.create({ title: 'Lease', text: TEXT });

    expect(created.id).toHaveLength(12);
    expect(created.status).toBe('uploaded');
    expect(await store.get(created.id)).toEqual(created);
  });

  it('returns null for an unknown id', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('updates the status', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    await store.setStatus(id, 'processed');

    expect((await store.get(id))?.status).toBe('processed');
  });

  it('deletes documents and reports whether anything was removed', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    await store.replaceSlots(id, SlotRegistry.build(TEXT).list());

    expect(await store.delete(id)).toBe(true);
    expect(await store.delete(id)).toBe(false);
    expect(await store.getSlots(id)).toEqual([]);
  });

  it('lists documents with slot counts', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    const registry = SlotRegistry.build(TEXT);
    registry.update(0, 'Jane Doe');
    registry.update(1, null, 'skipped');
    await store.replaceSlots(id, registry.list());

    const [summary] = await store.list();
    expect(summary).toMatchObject({
      id,
      title: 'Lease',
      slotCount: 3,
      filledCount: 1,
      skippedCount: 1,
    });
    expect(summary).not.toHaveProperty('text');
  });

  it('lists a document without slots with zero counts', async () => {
    await store.create({ title: 'Blank', text: 'no placeholders' });

    const [summary] = await store.list();
    expect(summary.slotCount).toBe(0);
    expect(summary.filledCount).toBe(0);
    expect(summary.skippedCount).toBe(0);
  });
});

/* ============= Slots ============= */

describe('DocumentStore slots', () => {
  it('round-trips extracted slots', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    const slots = SlotRegistry.build(TEXT).list();
    await store.replaceSlots(id, slots);

    expect(await store.getSlots(id)).toEqual(slots);
  });

  it('replaces slots wholesale on re-extraction', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    await store.replaceSlots(id, SlotRegistry.build(TEXT).list());
    await store.replaceSlots(id, SlotRegistry.build('Signed by [NAME].').list());

    const slots = await store.getSlots(id);
    expect(slots.map((s) => s.rawToken)).toEqual(['[NAME]']);
  });

  it('writes back values and statuses only', async () => {
    const { id } = await store.create({ title: 'Lease', text: TEXT });
    const registry = SlotRegistry.build(TEXT);
    await store.replaceSlots(id, registry.list());

    const filled = registry.update(2, '2024-03-01');
    await store.saveSlotValues(id, [filled]);

    const slots = await store.getSlots(id);
    expect(slots[2]).toEqual(filled);
    expect(slots[0].status).toBe('pending');
  });
});
