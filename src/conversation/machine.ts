// src/conversation/machine.ts
// Conversation State Machine
//
//   idle --start--> awaiting_input   (a slot is pending; prompt sent)
//   idle --start--> complete         (nothing pending; completion sent)
//   awaiting_input --receive(valid)/skip--> idle --start--> ...
//   awaiting_input --receive(invalid)--> awaiting_input (reason + prompt)
//
// The machine mutates the session and registry it is handed and does no I/O.
// Callers serialize calls per session.

import { InvalidStateError } from '../errors';
import type { SlotRegistry } from '../extraction/registry';
import type { Slot } from '../extraction/types';
import { defaultValidators, type ValidatorTable } from '../validators';
import {
  acknowledgeFill,
  acknowledgeSkip,
  alreadyResolvedMessage,
  completionMessage,
  rejectionMessage,
} from './messages';
import type {
  ChatMessage,
  ConversationSession,
  MessageRole,
  TurnOutcome,
  TurnResult,
} from './types';

export interface MachineOptions {
  validators?: ValidatorTable;
  now?: () => Date;
  /** Mirrors the assembly policy; only changes what the user is told */
  allowSkipped?: boolean;
}

export class ConversationMachine {
  private readonly validators: ValidatorTable;
  private readonly now: () => Date;
  private readonly allowSkipped: boolean;

  constructor(options: MachineOptions = {}) {
    this.validators = options.validators ?? defaultValidators;
    this.now = options.now ?? (() => new Date());
    this.allowSkipped = options.allowSkipped ?? true;
  }

  newSession(documentId: string, sessionId: string): ConversationSession {
    const ts = this.now().toISOString();
    return {
      sessionId,
      documentId,
      state: 'idle',
      cursor: null,
      history: [],
      createdAt: ts,
      updatedAt: ts,
    };
  }

  /** Prompt for the next pending slot, or finish when none is left */
  start(session: ConversationSession, registry: SlotRegistry): TurnResult {
    if (session.state !== 'idle') throw new InvalidStateError('start', session.state);

    const appended: ChatMessage[] = [];
    const outcome = this.advance(session, registry, appended);
    return this.result(session, registry, outcome, appended, null);
  }

  receive(session: ConversationSession, registry: SlotRegistry, text: string): TurnResult {
    const slot = this.cursorSlot(session, registry, 'receive');
    const appended: ChatMessage[] = [];
    this.append(session, appended, 'user', text, slot.id);

    const verdict = this.validators[slot.inferredType](text);
    if (!verdict.ok) {
      this.append(session, appended, 'assistant', rejectionMessage(verdict.reason, slot.prompt), slot.id);
      return this.result(session, registry, 'rejected', appended, verdict.reason);
    }

    registry.update(slot.id, verdict.value, 'filled');
    this.append(session, appended, 'assistant', acknowledgeFill(slot, verdict.value), slot.id);
    session.state = 'idle';
    session.cursor = null;
    this.advance(session, registry, appended);
    return this.result(session, registry, 'accepted', appended, null);
  }

  skip(session: ConversationSession, registry: SlotRegistry): TurnResult {
    const slot = this.cursorSlot(session, registry, 'skip');
    const appended: ChatMessage[] = [];

    registry.update(slot.id, null, 'skipped');
    this.append(session, appended, 'assistant', acknowledgeSkip(slot, this.allowSkipped), slot.id);
    session.state = 'idle';
    session.cursor = null;
    this.advance(session, registry, appended);
    return this.result(session, registry, 'skipped', appended, null);
  }

  /**
   * Move a session off a cursor slot that another session on the same
   * document resolved in the meantime. Null when the cursor is still pending.
   */
  resync(session: ConversationSession, registry: SlotRegistry): TurnResult | null {
    if (session.state !== 'awaiting_input' || session.cursor === null) return null;
    const slot = registry.get(session.cursor);
    if (slot.status === 'pending') return null;

    const appended: ChatMessage[] = [];
    this.append(session, appended, 'assistant', alreadyResolvedMessage(slot), slot.id);
    session.state = 'idle';
    session.cursor = null;
    const outcome = this.advance(session, registry, appended);
    return this.result(session, registry, outcome, appended, null);
  }

  /**
   * Share of resolved slots. Reaches 1 only in the complete state, so an
   * empty document reports 0 until its session has finished.
   */
  progress(session: ConversationSession, registry: SlotRegistry): number {
    if (session.state === 'complete') return 1;
    return registry.progress().ratio;
  }

  /* ---------- internals ---------- */

  private advance(
    session: ConversationSession,
    registry: SlotRegistry,
    appended: ChatMessage[]
  ): TurnOutcome {
    const next = registry.nextPending();
    if (next) {
      session.state = 'awaiting_input';
      session.cursor = next.id;
      this.append(session, appended, 'assistant', next.prompt, next.id);
      return 'prompted';
    }

    session.state = 'complete';
    session.cursor = null;
    const blockedSkips = this.allowSkipped ? 0 : registry.progress().skipped;
    this.append(session, appended, 'assistant', completionMessage(registry.size, blockedSkips), null);
    return 'complete';
  }

  private cursorSlot(session: ConversationSession, registry: SlotRegistry, operation: string): Slot {
    if (session.state !== 'awaiting_input' || session.cursor === null) {
      throw new InvalidStateError(operation, session.state);
    }
    return registry.get(session.cursor);
  }

  private append(
    session: ConversationSession,
    appended: ChatMessage[],
    role: MessageRole,
    text: string,
    relatedSlotId: number | null
  ): void {
    const timestamp = this.now().toISOString();
    const message: ChatMessage = { role, text, timestamp, relatedSlotId };
    session.history.push(message);
    appended.push(message);
    session.updatedAt = timestamp;
  }

  private result(
    session: ConversationSession,
    registry: SlotRegistry,
    outcome: TurnOutcome,
    messages: ChatMessage[],
    rejection: string | null
  ): TurnResult {
    return {
      outcome,
      state: session.state,
      messages,
      rejection,
      cursorSlot: session.cursor !== null ? registry.get(session.cursor) : null,
      progress: this.progress(session, registry),
    };
  }
}
