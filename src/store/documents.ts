// src/store/documents.ts
// Documents and their extracted slots.
//
// Tables: documents, slots
// Slots of a document are replaced wholesale on (re-)extraction and otherwise
// only have value/status written back.

import { nanoid } from 'nanoid';
import type { DbAdapter } from '../db/types';
import {
  isSlotStatus,
  isSlotType,
  isSpanKind,
  isTypeSource,
  type Slot,
} from '../extraction/types';

/* ---------- Types ---------- */

export type DocumentStatus = 'uploaded' | 'processed' | 'completed';

const VALID_STATUSES: readonly DocumentStatus[] = ['uploaded', 'processed', 'completed'];

export function isDocumentStatus(value: string): value is DocumentStatus {
  return VALID_STATUSES.some((s) => s === value);
}

export interface DocumentRecord {
  id: string;
  title: string;
  text: string;
  status: DocumentStatus;
  createdAt: string; // ISO string
  updatedAt: string;
}

/** List entry: no text, plus slot counts */
export interface DocumentSummary extends Omit<DocumentRecord, 'text'> {
  slotCount: number;
  filledCount: number;
  skippedCount: number;
}

export interface CreateDocumentInput {
  title: string;
  text: string;
}

export interface DocumentStore {
  create(input: CreateDocumentInput): Promise<DocumentRecord>;
  get(id: string): Promise<DocumentRecord | null>;
  list(): Promise<DocumentSummary[]>;
  setStatus(id: string, status: DocumentStatus): Promise<void>;
  /** Cascades to slots and sessions */
  delete(id: string): Promise<boolean>;
  getSlots(documentId: string): Promise<Slot[]>;
  replaceSlots(documentId: string, slots: readonly Slot[]): Promise<void>;
  /** Write back value and status of the given slots */
  saveSlotValues(documentId: string, slots: readonly Slot[]): Promise<void>;
  /** Same store bound to an open transaction */
  withTransaction(tx: DbAdapter): DocumentStore;
}

// Row types (snake_case, match DB)
interface DocumentRow {
  id: string;
  title: string;
  text: string;
  status: string;
  created_at: number;
  updated_at: number;
}

interface DocumentSummaryRow extends Omit<DocumentRow, 'text'> {
  slot_count: number;
  filled_count: number;
  skipped_count: number;
}

interface SlotRow {
  document_id: string;
  id: number;
  span_start: number;
  span_end: number;
  raw_token: string;
  kind: string;
  label: string | null;
  inferred_type: string;
  type_source: string;
  prompt: string;
  value: string | null;
  status: string;
  alias_of: number | null;
}

/* ---------- Row to Domain Converters ---------- */

function rowToDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    title: row.title,
    text: row.text,
    status: isDocumentStatus(row.status) ? row.status : 'uploaded',
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

function rowToSummary(row: DocumentSummaryRow): DocumentSummary {
  return {
    id: row.id,
    title: row.title,
    status: isDocumentStatus(row.status) ? row.status : 'uploaded',
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
    slotCount: row.slot_count,
    filledCount: row.filled_count,
    skippedCount: row.skipped_count,
  };
}

function rowToSlot(row: SlotRow): Slot {
  return {
    id: row.id,
    span: { start: row.span_start, end: row.span_end },
    rawToken: row.raw_token,
    kind: isSpanKind(row.kind) ? row.kind : 'bracket',
    label: row.label,
    inferredType: isSlotType(row.inferred_type) ? row.inferred_type : 'free_text',
    typeSource: isTypeSource(row.type_source) ? row.type_source : 'fallback',
    prompt: row.prompt,
    value: row.value,
    status: isSlotStatus(row.status) ? row.status : 'pending',
    aliasOf: row.alias_of,
  };
}

/* ---------- Store ---------- */

export function createDocumentStore(db: DbAdapter): DocumentStore {
  async function get(id: string): Promise<DocumentRecord | null> {
    const row = await db.queryOne<DocumentRow>(`SELECT * FROM documents WHERE id = ?`, [id]);
    return row ? rowToDocument(row) : null;
  }

  return {
    withTransaction: (tx: DbAdapter) => createDocumentStore(tx),

    async create(input: CreateDocumentInput): Promise<DocumentRecord> {
      const id = nanoid(12);
      const now = Date.now();
      await db.run(
        `INSERT INTO documents (id, title, text, status, created_at, updated_at)
         VALUES (?, ?, ?, 'uploaded', ?, ?)`,
        [id, input.title, input.text, now, now]
      );
      return {
        id,
        title: input.title,
        text: input.text,
        status: 'uploaded',
        createdAt: new Date(now).toISOString(),
        updatedAt: new Date(now).toISOString(),
      };
    },

    get,

    async list(): Promise<DocumentSummary[]> {
      const rows = await db.queryAll<DocumentSummaryRow>(`
        SELECT d.id, d.title, d.status, d.created_at, d.updated_at,
               COUNT(s.id) AS slot_count,
               COALESCE(SUM(CASE WHEN s.status = 'filled' THEN 1 ELSE 0 END), 0) AS filled_count,
               COALESCE(SUM(CASE WHEN s.status = 'skipped' THEN 1 ELSE 0 END), 0) AS skipped_count
        FROM documents d
        LEFT JOIN slots s ON s.document_id = d.id
        GROUP BY d.id
        ORDER BY d.created_at DESC, d.id ASC
      `);
      return rows.map(rowToSummary);
    },

    async setStatus(id: string, status: DocumentStatus): Promise<void> {
      await db.run(`UPDATE documents SET status = ?, updated_at = ? WHERE id = ?`, [
        status,
        Date.now(),
        id,
      ]);
    },

    async delete(id: string): Promise<boolean> {
      const result = await db.run(`DELETE FROM documents WHERE id = ?`, [id]);
      return result.changes > 0;
    },

    async getSlots(documentId: string): Promise<Slot[]> {
      const rows = await db.queryAll<SlotRow>(
        `SELECT * FROM slots WHERE document_id = ? ORDER BY id ASC`,
        [documentId]
      );
      return rows.map(rowToSlot);
    },

    async replaceSlots(documentId: string, slots: readonly Slot[]): Promise<void> {
      await db.transaction(async (tx) => {
        await tx.run(`DELETE FROM slots WHERE document_id = ?`, [documentId]);
        for (const slot of slots) {
          await tx.run(
            `INSERT INTO slots (
               document_id, id, span_start, span_end, raw_token, kind, label,
               inferred_type, type_source, prompt, value, status, alias_of
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              documentId,
              slot.id,
              slot.span.start,
              slot.span.end,
              slot.rawToken,
              slot.kind,
              slot.label,
              slot.inferredType,
              slot.typeSource,
              slot.prompt,
              slot.value,
              slot.status,
              slot.aliasOf,
            ]
          );
        }
        await tx.run(`UPDATE documents SET updated_at = ? WHERE id = ?`, [Date.now(), documentId]);
      });
    },

    async saveSlotValues(documentId: string, slots: readonly Slot[]): Promise<void> {
      await db.transaction(async (tx) => {
        for (const slot of slots) {
          await tx.run(
            `UPDATE slots SET value = ?, status = ? WHERE document_id = ? AND id = ?`,
            [slot.value, slot.status, documentId, slot.id]
          );
        }
      });
    },
  };
}
