// src/observability/metricsCollector.ts
// Fastify hooks that time every request and feed the HTTP metrics.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { recordHttpRequest, METRICS_ENABLED } from "./metrics";
import { createLogger } from "./logger";

const log = createLogger("metrics");

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.info("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    // Route pattern (with placeholders) when the request matched a route
    const routePattern = req.routeOptions.url ?? req.url;
    recordHttpRequest(req.method, routePattern, reply.statusCode, duration);

    requestStartTimes.delete(req);
  });
}
