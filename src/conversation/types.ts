// src/conversation/types.ts
// Conversation State Machine: session, message and turn types

import type { Slot } from '../extraction/types';

export type SessionState = 'idle' | 'awaiting_input' | 'complete';

export const SESSION_STATES: readonly SessionState[] = ['idle', 'awaiting_input', 'complete'];

export function isSessionState(value: string): value is SessionState {
  return SESSION_STATES.some((s) => s === value);
}

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  text: string;
  timestamp: string; // ISO string
  relatedSlotId: number | null;
}

export interface ConversationSession {
  sessionId: string;
  documentId: string;
  state: SessionState;
  /** Slot awaiting a reply; null unless awaiting_input */
  cursor: number | null;
  /** Append-only */
  history: ChatMessage[];
  createdAt: string;
  updatedAt: string;
}

export type TurnOutcome = 'prompted' | 'accepted' | 'rejected' | 'skipped' | 'complete';

/** What one start/receive/skip call did, as delivered back to the client */
export interface TurnResult {
  outcome: TurnOutcome;
  state: SessionState;
  /** Messages appended by this turn, in order (the user's reply included) */
  messages: ChatMessage[];
  rejection: string | null;
  /** Slot now awaiting a reply, or null once complete */
  cursorSlot: Slot | null;
  progress: number;
}
