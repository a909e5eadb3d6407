// src/observability/index.ts
// Central export point for observability functionality.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId";

/* ---------- Request Logger ---------- */
export {
  createRequestLogger,
  registerRequestLogger,
  getRequestLogger,
} from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordSlotsExtracted,
  recordInference,
  recordValidationRejection,
  recordSessionCompleted,
  recordAssembly,
  METRICS_ENABLED,
} from "./metrics";

export { registerMetricsCollector } from "./metricsCollector";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  isReady,
  isAlive,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";
import { registerMetricsCollector } from "./metricsCollector";

/**
 * Register all observability hooks with Fastify.
 * Call this right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
