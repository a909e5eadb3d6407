// src/middleware/errorHandler.ts
// Maps thrown errors to JSON responses: { error, code?, details? }

import type { FastifyError, FastifyInstance } from 'fastify';
import {
  DocumentInUseError,
  IncompleteDocumentError,
  isDomainError,
  type DomainErrorCode,
} from '../errors';
import { getRequestLogger } from '../observability/requestLogger';

const STATUS_BY_CODE: Record<DomainErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  INCOMPLETE_DOCUMENT: 409,
  CLASSIFIER_UNAVAILABLE: 503,
};

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (isDomainError(error)) {
      let details: Record<string, unknown> | undefined;
      if (error instanceof IncompleteDocumentError) {
        details = { pendingSlotIds: error.pendingSlotIds, skippedSlotIds: error.skippedSlotIds };
      } else if (error instanceof DocumentInUseError) {
        details = { openSessions: error.openSessions };
      }
      return reply
        .code(STATUS_BY_CODE[error.code])
        .send({ error: error.message, code: error.code, ...(details ? { details } : {}) });
    }

    // Fastify body parsing / schema errors and plugin errors (e.g. 429)
    const status = typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (status < 500) {
      return reply.code(status).send({ error: error.message, code: error.code ?? 'BAD_REQUEST' });
    }

    getRequestLogger(req).error({ err: error }, 'unhandled error');
    return reply.code(500).send({ error: 'Internal Server Error', code: 'INTERNAL' });
  });
}
