// src/routes/metrics.ts
// GET /metrics: Prometheus text exposition of the process registry

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { Registry } from "prom-client";
import { createLogger } from "../observability/logger";
import { registry as defaultRegistry } from "../observability/metrics";

const log = createLogger("routes/metrics");

/* ---------- Route Registration ---------- */
export function createMetricsRoutes(source: Registry = defaultRegistry) {
  return async function metricsRoutes(app: FastifyInstance) {
    app.get("/metrics", async (_req: FastifyRequest, reply: FastifyReply) => {
      let body: string;
      try {
        body = await source.metrics();
      } catch (err) {
        log.error({ err }, "metrics collection failed");
        return reply.code(500).send({ error: "metrics unavailable" });
      }
      return reply.type(source.contentType).send(body);
    });
  };
}
