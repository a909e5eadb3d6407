// src/conversation/service.ts
// Loads a session and its document's slots, runs one machine transition and
// persists the result.
//
// Locking: per sessionId first, then per documentId around
// load -> transition -> persist. Every path takes them in that order.

import { nanoid } from 'nanoid';
import type { DbAdapter } from '../db/types';
import { InvalidStateError, NotFoundError } from '../errors';
import { SlotRegistry } from '../extraction/registry';
import type { Slot } from '../extraction/types';
import { createLogger } from '../observability/logger';
import { recordSessionCompleted, recordValidationRejection } from '../observability/metrics';
import type { DocumentStore } from '../store/documents';
import type { ConversationStore } from '../store/sessions';
import { KeyedLock } from '../utils/keyedLock';
import { ConversationMachine } from './machine';
import type { ConversationSession, TurnResult } from './types';

const log = createLogger('conversation/service');

export interface ConversationServiceDeps {
  db: DbAdapter;
  documents: DocumentStore;
  sessions: ConversationStore;
  machine?: ConversationMachine;
  documentLocks?: KeyedLock;
  sessionLocks?: KeyedLock;
  generateSessionId?: () => string;
}

export interface SessionView {
  session: ConversationSession;
  progress: number;
  cursorSlot: Slot | null;
}

export interface OpenedSession extends SessionView {
  created: boolean;
  /** First turn of a new session; null when an existing session was returned */
  turn: TurnResult | null;
}

type Transition = (session: ConversationSession, registry: SlotRegistry) => TurnResult;

function slotChanged(before: Slot | undefined, after: Slot): boolean {
  return !before || before.status !== after.status || before.value !== after.value;
}

export class ConversationService {
  private readonly machine: ConversationMachine;
  private readonly documentLocks: KeyedLock;
  private readonly sessionLocks: KeyedLock;
  private readonly generateSessionId: () => string;

  constructor(private readonly deps: ConversationServiceDeps) {
    this.machine = deps.machine ?? new ConversationMachine();
    this.documentLocks = deps.documentLocks ?? new KeyedLock();
    this.sessionLocks = deps.sessionLocks ?? new KeyedLock();
    this.generateSessionId = deps.generateSessionId ?? (() => nanoid());
  }

  /**
   * Get-or-create: an existing session id is resumed, otherwise a session is
   * created and started (its first prompt or the completion message).
   */
  async openSession(documentId: string, sessionId?: string): Promise<OpenedSession> {
    const id = sessionId ?? this.generateSessionId();

    return this.sessionLocks.run(id, async () => {
      const existing = await this.deps.sessions.get(id);
      if (existing) {
        if (existing.documentId !== documentId) {
          throw new InvalidStateError(`reuse it for document ${documentId}`, 'bound to another document');
        }
        return { ...(await this.resume(existing)), created: false, turn: null };
      }

      return this.documentLocks.run(documentId, async () => {
        const doc = await this.deps.documents.get(documentId);
        if (!doc) throw new NotFoundError('document', documentId);

        const registry = SlotRegistry.fromSlots(await this.deps.documents.getSlots(documentId));
        const session = this.machine.newSession(documentId, id);
        const turn = this.machine.start(session, registry);

        await this.deps.sessions.create(session);
        if (turn.state === 'complete') recordSessionCompleted();
        log.info({ documentId, sessionId: id, slots: registry.size }, 'session opened');

        return {
          session,
          progress: turn.progress,
          cursorSlot: turn.cursorSlot,
          created: true,
          turn,
        };
      });
    });
  }

  getSession(sessionId: string): Promise<SessionView> {
    return this.sessionLocks.run(sessionId, async () => {
      const session = await this.deps.sessions.get(sessionId);
      if (!session) throw new NotFoundError('session', sessionId);
      return this.resume(session);
    });
  }

  reply(sessionId: string, text: string): Promise<TurnResult> {
    return this.transition(sessionId, (session, registry) =>
      this.machine.receive(session, registry, text)
    );
  }

  skip(sessionId: string): Promise<TurnResult> {
    return this.transition(sessionId, (session, registry) => this.machine.skip(session, registry));
  }

  /* ---------- internals ---------- */

  /** Caller holds the session lock */
  private resume(session: ConversationSession): Promise<SessionView> {
    return this.documentLocks.run(session.documentId, async () => {
      const registry = SlotRegistry.fromSlots(await this.deps.documents.getSlots(session.documentId));
      const resynced = this.machine.resync(session, registry);
      if (resynced) {
        await this.deps.sessions.save(session, resynced.messages);
        if (resynced.state === 'complete') recordSessionCompleted();
      }
      return {
        session,
        progress: this.machine.progress(session, registry),
        cursorSlot: session.cursor !== null ? registry.get(session.cursor) : null,
      };
    });
  }

  private transition(sessionId: string, apply: Transition): Promise<TurnResult> {
    return this.sessionLocks.run(sessionId, async () => {
      const session = await this.deps.sessions.get(sessionId);
      if (!session) throw new NotFoundError('session', sessionId);

      return this.documentLocks.run(session.documentId, async () => {
        const before = await this.deps.documents.getSlots(session.documentId);
        const registry = SlotRegistry.fromSlots(before);
        const previousState = session.state;
        const cursorType =
          session.cursor !== null ? registry.get(session.cursor).inferredType : null;

        // a cursor another session resolved is moved on first; the reply or
        // skip was aimed at that slot and is not applied
        const turn = this.machine.resync(session, registry) ?? apply(session, registry);

        const byId = new Map(before.map((s) => [s.id, s]));
        const changed = registry.list().filter((s) => slotChanged(byId.get(s.id), s));

        await this.deps.db.transaction(async (tx) => {
          await this.deps.documents.withTransaction(tx).saveSlotValues(session.documentId, changed);
          await this.deps.sessions.withTransaction(tx).save(session, turn.messages);
        });

        if (turn.outcome === 'rejected' && cursorType) recordValidationRejection(cursorType);
        if (turn.state === 'complete' && previousState !== 'complete') recordSessionCompleted();
        log.debug(
          { sessionId, outcome: turn.outcome, state: turn.state, changedSlots: changed.length },
          'turn processed'
        );
        return turn;
      });
    });
  }
}
