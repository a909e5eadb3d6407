// src/routes/health.ts
// Health check endpoints
// - GET /health       - Full health status with dependency checks
// - GET /health/ready - Readiness probe
// - GET /health/live  - Liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { DbAdapter } from "../db/types";
import { getHealthStatus, isReady, isAlive } from "../observability/healthCheck";

/* ---------- Route Registration ---------- */
export function createHealthRoutes(db: DbAdapter) {
  return async function healthRoutes(app: FastifyInstance) {
    /**
     * GET /health
     * 200 when healthy, 503 otherwise
     */
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const health = await getHealthStatus(db);
      return reply.code(health.status === "healthy" ? 200 : 503).send(health);
    });

    app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await isReady(db);
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get("/health/live", async (_req: FastifyRequest, reply: FastifyReply) => {
      const alive = await isAlive();
      return reply.code(alive ? 200 : 503).send({ alive });
    });
  };
}
