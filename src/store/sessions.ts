// src/store/sessions.ts
// Conversation sessions and their message history.
//
// Tables: conversation_sessions, conversation_messages
// History is append-only: messages are inserted with a per-session sequence
// number and never updated.

import type { DbAdapter } from '../db/types';
import {
  isSessionState,
  type ChatMessage,
  type ConversationSession,
  type SessionState,
} from '../conversation/types';

/* ---------- Types ---------- */

export interface SessionSummary {
  sessionId: string;
  documentId: string;
  state: SessionState;
  cursor: number | null;
  messageCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface ConversationStore {
  /** Insert a new session together with its initial history */
  create(session: ConversationSession): Promise<void>;
  get(sessionId: string): Promise<ConversationSession | null>;
  listByDocument(documentId: string): Promise<SessionSummary[]>;
  /** Sessions of the document that have not reached complete */
  countOpen(documentId: string): Promise<number>;
  /** Persist state/cursor and append the messages added since the last save */
  save(session: ConversationSession, appended: readonly ChatMessage[]): Promise<void>;
  /** Same store bound to an open transaction */
  withTransaction(tx: DbAdapter): ConversationStore;
}

interface SessionRow {
  id: string;
  document_id: string;
  state: string;
  cursor: number | null;
  created_at: number;
  updated_at: number;
}

interface SessionSummaryRow extends SessionRow {
  message_count: number;
}

interface MessageRow {
  seq: number;
  role: string;
  text: string;
  related_slot_id: number | null;
  created_at: number;
}

/* ---------- Row to Domain Converters ---------- */

function rowToMessage(row: MessageRow): ChatMessage {
  return {
    role: row.role === 'user' ? 'user' : 'assistant',
    text: row.text,
    timestamp: new Date(row.created_at).toISOString(),
    relatedSlotId: row.related_slot_id,
  };
}

function rowToSession(row: SessionRow, history: ChatMessage[]): ConversationSession {
  return {
    sessionId: row.id,
    documentId: row.document_id,
    state: isSessionState(row.state) ? row.state : 'idle',
    cursor: row.cursor,
    history,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

function rowToSummary(row: SessionSummaryRow): SessionSummary {
  return {
    sessionId: row.id,
    documentId: row.document_id,
    state: isSessionState(row.state) ? row.state : 'idle',
    cursor: row.cursor,
    messageCount: row.message_count,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

/* ---------- Store ---------- */

export function createConversationStore(db: DbAdapter): ConversationStore {
  async function insertMessages(
    tx: DbAdapter,
    sessionId: string,
    firstSeq: number,
    messages: readonly ChatMessage[]
  ): Promise<void> {
    for (const [i, message] of messages.entries()) {
      await tx.run(
        `INSERT INTO conversation_messages (session_id, seq, role, text, related_slot_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          sessionId,
          firstSeq + i,
          message.role,
          message.text,
          message.relatedSlotId,
          Date.parse(message.timestamp),
        ]
      );
    }
  }

  return {
    withTransaction: (tx: DbAdapter) => createConversationStore(tx),

    async create(session: ConversationSession): Promise<void> {
      await db.transaction(async (tx) => {
        await tx.run(
          `INSERT INTO conversation_sessions (id, document_id, state, cursor, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
          [
            session.sessionId,
            session.documentId,
            session.state,
            session.cursor,
            Date.parse(session.createdAt),
            Date.parse(session.updatedAt),
          ]
        );
        await insertMessages(tx, session.sessionId, 0, session.history);
      });
    },

    async get(sessionId: string): Promise<ConversationSession | null> {
      const row = await db.queryOne<SessionRow>(
        `SELECT * FROM conversation_sessions WHERE id = ?`,
        [sessionId]
      );
      if (!row) return null;

      const messages = await db.queryAll<MessageRow>(
        `SELECT seq, role, text, related_slot_id, created_at
         FROM conversation_messages WHERE session_id = ? ORDER BY seq ASC`,
        [sessionId]
      );
      return rowToSession(row, messages.map(rowToMessage));
    },

    async listByDocument(documentId: string): Promise<SessionSummary[]> {
      const rows = await db.queryAll<SessionSummaryRow>(
        `SELECT s.*, COUNT(m.id) AS message_count
         FROM conversation_sessions s
         LEFT JOIN conversation_messages m ON m.session_id = s.id
         WHERE s.document_id = ?
         GROUP BY s.id
         ORDER BY s.created_at ASC, s.id ASC`,
        [documentId]
      );
      return rows.map(rowToSummary);
    },

    async countOpen(documentId: string): Promise<number> {
      const row = await db.queryOne<{ count: number }>(
        `SELECT COUNT(*) AS count FROM conversation_sessions
         WHERE document_id = ? AND state != 'complete'`,
        [documentId]
      );
      return row?.count ?? 0;
    },

    async save(session: ConversationSession, appended: readonly ChatMessage[]): Promise<void> {
      await db.transaction(async (tx) => {
        await tx.run(
          `UPDATE conversation_sessions SET state = ?, cursor = ?, updated_at = ? WHERE id = ?`,
          [session.state, session.cursor, Date.parse(session.updatedAt), session.sessionId]
        );
        await insertMessages(
          tx,
          session.sessionId,
          session.history.length - appended.length,
          appended
        );
      });
    },
  };
}
