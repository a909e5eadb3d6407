// src/routes/sessions.ts
// Conversation endpoints.
//
// - POST /documents/:id/sessions        - Open (or resume) a session
// - GET  /documents/:id/sessions        - Sessions of a document
// - GET  /sessions/:sessionId           - Session with history and progress
// - POST /sessions/:sessionId/messages  - User reply to the current prompt
// - POST /sessions/:sessionId/skip      - Skip the current slot

import type { FastifyPluginAsync } from 'fastify';
import type { ConversationService } from '../conversation/service';
import type { DocumentStore } from '../store/documents';
import type { ConversationStore } from '../store/sessions';

interface OpenSessionBody {
  sessionId?: unknown;
}

interface MessageBody {
  text?: unknown;
}

export interface SessionRouteDeps {
  conversations: ConversationService;
  documents: DocumentStore;
  sessions: ConversationStore;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const MAX_MESSAGE_LENGTH = 10_000;

export function createSessionRoutes(deps: SessionRouteDeps): FastifyPluginAsync {
  const { conversations, documents, sessions } = deps;

  return async (fastify) => {
    /**
     * POST /documents/:id/sessions
     * Body: { sessionId? }. 201 when created, 200 when an existing session
     * with that id was resumed.
     */
    fastify.post<{ Params: { id: string }; Body: OpenSessionBody }>(
      '/documents/:id/sessions',
      async (req, reply) => {
        const { sessionId } = req.body ?? {};
        let requestedId: string | undefined;
        if (sessionId !== undefined) {
          if (typeof sessionId !== 'string' || !SESSION_ID_PATTERN.test(sessionId)) {
            return reply.code(400).send({
              error: 'sessionId must be 1-128 letters, digits, "-" or "_"',
              code: 'BAD_REQUEST',
            });
          }
          requestedId = sessionId;
        }

        const opened = await conversations.openSession(req.params.id, requestedId);
        return reply.code(opened.created ? 201 : 200).send({
          session: opened.session,
          progress: opened.progress,
          cursorSlot: opened.cursorSlot,
          messages: opened.turn?.messages ?? [],
        });
      }
    );

    /**
     * GET /documents/:id/sessions
     */
    fastify.get<{ Params: { id: string } }>('/documents/:id/sessions', async (req, reply) => {
      const document = await documents.get(req.params.id);
      if (!document) {
        return reply.code(404).send({ error: `document ${req.params.id} not found`, code: 'NOT_FOUND' });
      }
      return { sessions: await sessions.listByDocument(document.id) };
    });

    /**
     * GET /sessions/:sessionId
     */
    fastify.get<{ Params: { sessionId: string } }>('/sessions/:sessionId', async (req) => {
      return conversations.getSession(req.params.sessionId);
    });

    /**
     * POST /sessions/:sessionId/messages
     * Body: { text }. A rejected value is a normal 200 turn with outcome
     * "rejected"; only calls outside awaiting_input are 409.
     */
    fastify.post<{ Params: { sessionId: string }; Body: MessageBody }>(
      '/sessions/:sessionId/messages',
      async (req, reply) => {
        const { text } = req.body ?? {};
        if (typeof text !== 'string') {
          return reply.code(400).send({ error: 'text is required', code: 'BAD_REQUEST' });
        }
        if (text.length > MAX_MESSAGE_LENGTH) {
          return reply.code(400).send({ error: 'text is too long', code: 'BAD_REQUEST' });
        }
        return conversations.reply(req.params.sessionId, text);
      }
    );

    /**
     * POST /sessions/:sessionId/skip
     */
    fastify.post<{ Params: { sessionId: string } }>('/sessions/:sessionId/skip', async (req) => {
      return conversations.skip(req.params.sessionId);
    });
  };
}
