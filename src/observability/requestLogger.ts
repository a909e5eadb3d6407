// src/observability/requestLogger.ts
// Request/response logging with timing. Context (request id, document id,
// session id) is pulled from route params so handler logs can be correlated.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  documentId?: string;
  sessionId?: string;
}

/* ---------- Context Extraction ---------- */

function readParam(req: FastifyRequest, name: string): string | undefined {
  const params = req.params;
  if (params && typeof params === "object") {
    const value: unknown = Reflect.get(params, name);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    documentId: readParam(req, "id"),
    sessionId: readParam(req, "sessionId"),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

const requestLoggers = new WeakMap<FastifyRequest, Logger>();
const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, { ...buildRequestContext(req) });
}

/* ---------- Fastify Hook Registration ---------- */

/**
 * Logs request start (debug), completion (level by status code) and errors.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    const log = createRequestLogger(req);
    requestLoggers.set(req, log);
    log.debug("request started");
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    // params are only parsed after onRequest, so rebuild the context here
    const log = createChildLogger(baseLogger, {
      ...buildRequestContext(req),
      statusCode: reply.statusCode,
      duration,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }

    requestStartTimes.delete(req);
    requestLoggers.delete(req);
  });

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    getRequestLogger(req).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}

/**
 * Request-scoped logger for use inside handlers.
 * Falls back to a fresh child when called before onRequest ran.
 */
export function getRequestLogger(req: FastifyRequest): Logger {
  return requestLoggers.get(req) ?? createRequestLogger(req);
}
