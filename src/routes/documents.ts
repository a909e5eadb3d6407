// src/routes/documents.ts
// Document endpoints: ingestion, extraction, slot listing, assembly.
//
// Endpoints:
// - POST   /documents                 - Upload decoded text and extract slots
// - GET    /documents                 - List documents with slot counts
// - GET    /documents/:id             - Document with slots and progress
// - GET    /documents/:id/slots       - Slots (?pending=true for unresolved only)
// - POST   /documents/:id/process     - Re-run extraction
// - DELETE /documents/:id             - Delete document, slots and sessions
// - POST   /documents/:id/assemble    - Completed text as JSON
// - GET    /documents/:id/download    - Completed text as a plain-text attachment
//
// Domain errors are mapped to status codes by the app-level error handler.

import type { FastifyPluginAsync } from 'fastify';
import type { AssemblyService } from '../assembly/service';
import type { ExtractionService } from '../extraction/service';
import { SlotRegistry } from '../extraction/registry';
import { getRateLimitConfig } from '../middleware/rateLimit';
import { getRequestLogger } from '../observability/requestLogger';
import type { DocumentStore } from '../store/documents';

/* ---------- Types ---------- */

interface CreateDocumentBody {
  title?: unknown;
  text?: unknown;
}

interface SlotsQuery {
  pending?: string;
}

export interface DocumentRouteDeps {
  documents: DocumentStore;
  extraction: ExtractionService;
  assembly: AssemblyService;
  /** Limit POST /documents/:id/process (worth it only with model inference) */
  limitProcessing?: boolean;
}

/* ---------- Helpers ---------- */

const MAX_TITLE_LENGTH = 200;

function downloadName(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 80);
  return `${slug || 'document'}.txt`;
}

/* ---------- Routes ---------- */

export function createDocumentRoutes(deps: DocumentRouteDeps): FastifyPluginAsync {
  const { documents, extraction, assembly } = deps;

  return async (fastify) => {
    /**
     * POST /documents
     * Body: { title?, text }. Extraction runs right away.
     */
    fastify.post<{ Body: CreateDocumentBody }>('/documents', async (req, reply) => {
      const { title, text } = req.body ?? {};

      if (typeof text !== 'string' || text.trim().length === 0) {
        return reply.code(400).send({ error: 'text is required', code: 'BAD_REQUEST' });
      }
      let docTitle = 'Untitled document';
      if (title !== undefined) {
        if (typeof title !== 'string') {
          return reply.code(400).send({ error: 'title must be a string', code: 'BAD_REQUEST' });
        }
        docTitle = title.trim().slice(0, MAX_TITLE_LENGTH) || docTitle;
      }

      const created = await documents.create({ title: docTitle, text });
      const slots = await extraction.process(created.id);
      const document = (await documents.get(created.id)) ?? created;

      getRequestLogger(req).info({ documentId: created.id, slots: slots.length }, 'document uploaded');
      return reply.code(201).send({ document, slots });
    });

    /**
     * GET /documents
     */
    fastify.get('/documents', async () => {
      return { documents: await documents.list() };
    });

    /**
     * GET /documents/:id
     */
    fastify.get<{ Params: { id: string } }>('/documents/:id', async (req, reply) => {
      const document = await documents.get(req.params.id);
      if (!document) {
        return reply.code(404).send({ error: `document ${req.params.id} not found`, code: 'NOT_FOUND' });
      }

      const slots = await documents.getSlots(document.id);
      const progress = SlotRegistry.fromSlots(slots).progress();
      return { document, slots, progress };
    });

    /**
     * GET /documents/:id/slots?pending=true
     */
    fastify.get<{ Params: { id: string }; Querystring: SlotsQuery }>(
      '/documents/:id/slots',
      async (req, reply) => {
        const document = await documents.get(req.params.id);
        if (!document) {
          return reply.code(404).send({ error: `document ${req.params.id} not found`, code: 'NOT_FOUND' });
        }

        const pendingOnly = req.query.pending === 'true' || req.query.pending === '1';
        const slots = await documents.getSlots(document.id);
        return { slots: pendingOnly ? slots.filter((s) => s.status === 'pending') : slots };
      }
    );

    /**
     * POST /documents/:id/process
     * Re-extraction discards slot values, so it is refused while a
     * conversation on the document is still running.
     */
    fastify.post<{ Params: { id: string } }>(
      '/documents/:id/process',
      getRateLimitConfig('process', deps.limitProcessing ?? false),
      async (req, reply) => {
        const document = await documents.get(req.params.id);
        if (!document) {
          return reply.code(404).send({ error: `document ${req.params.id} not found`, code: 'NOT_FOUND' });
        }

        const slots = await extraction.process(document.id);
        return { document: (await documents.get(document.id)) ?? document, slots };
      }
    );

    /**
     * DELETE /documents/:id
     */
    fastify.delete<{ Params: { id: string } }>('/documents/:id', async (req, reply) => {
      const deleted = await documents.delete(req.params.id);
      if (!deleted) {
        return reply.code(404).send({ error: `document ${req.params.id} not found`, code: 'NOT_FOUND' });
      }
      return reply.code(204).send();
    });

    /**
     * POST /documents/:id/assemble
     */
    fastify.post<{ Params: { id: string } }>('/documents/:id/assemble', async (req) => {
      const { document, text } = await assembly.assembleDocument(req.params.id);
      return { documentId: document.id, title: document.title, text };
    });

    /**
     * GET /documents/:id/download
     */
    fastify.get<{ Params: { id: string } }>('/documents/:id/download', async (req, reply) => {
      const { document, text } = await assembly.assembleDocument(req.params.id);
      return reply
        .header('Content-Type', 'text/plain; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="${downloadName(document.title)}"`)
        .send(text);
    });
  };
}
