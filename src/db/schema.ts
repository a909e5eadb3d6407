// src/db/schema.ts
// Base tables (idempotent). Slot ids are per-document sequence numbers,
// hence the composite primary key.

import type Database from 'better-sqlite3';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  text TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'uploaded',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS slots (
  document_id TEXT NOT NULL,
  id INTEGER NOT NULL,
  span_start INTEGER NOT NULL,
  span_end INTEGER NOT NULL,
  raw_token TEXT NOT NULL,
  kind TEXT NOT NULL,
  label TEXT,
  inferred_type TEXT NOT NULL,
  type_source TEXT NOT NULL,
  prompt TEXT NOT NULL,
  value TEXT,
  status TEXT NOT NULL DEFAULT 'pending',
  alias_of INTEGER,
  PRIMARY KEY (document_id, id),
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_slots_doc_status ON slots (document_id, status);

CREATE TABLE IF NOT EXISTS conversation_sessions (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  state TEXT NOT NULL DEFAULT 'idle',
  cursor INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_sessions_doc ON conversation_sessions (document_id);

CREATE TABLE IF NOT EXISTS conversation_messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  role TEXT NOT NULL,
  text TEXT NOT NULL,
  related_slot_id INTEGER,
  created_at INTEGER NOT NULL,
  FOREIGN KEY (session_id) REFERENCES conversation_sessions(id) ON DELETE CASCADE
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_messages_session_seq ON conversation_messages (session_id, seq);
`;

export function initSchema(rawDb: Database.Database): void {
  rawDb.exec(SCHEMA_SQL);
}
