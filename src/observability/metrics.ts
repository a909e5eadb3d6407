// src/observability/metrics.ts
// Prometheus metrics (prom-client), exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import { config } from "../config";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = config.metrics.prefix;
export const METRICS_ENABLED = config.metrics.enabled;

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "blankfill-api",
});

if (METRICS_ENABLED && !process.env.VITEST) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

/* ---------- Extraction Metrics ---------- */

export const slotsExtractedTotal = new Counter({
  name: `${METRICS_PREFIX}_slots_extracted_total`,
  help: "Slots produced by extraction, by inferred type",
  labelNames: ["type"] as const,
  registers: [registry],
});

export const classifierInferenceTotal = new Counter({
  name: `${METRICS_PREFIX}_classifier_inference_total`,
  help: "Semantic inference calls by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

/* ---------- Conversation Metrics ---------- */

export const validationRejectionsTotal = new Counter({
  name: `${METRICS_PREFIX}_validation_rejections_total`,
  help: "User replies rejected by a slot validator",
  labelNames: ["type"] as const,
  registers: [registry],
});

export const sessionsCompletedTotal = new Counter({
  name: `${METRICS_PREFIX}_sessions_completed_total`,
  help: "Conversation sessions that reached the complete state",
  registers: [registry],
});

/* ---------- Assembly Metrics ---------- */

export const assembliesTotal = new Counter({
  name: `${METRICS_PREFIX}_assemblies_total`,
  help: "Document assembly attempts by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

/** Collapse ids so label cardinality stays bounded when no route pattern is known */
function normalizeRoute(route: string): string {
  return route
    .split("?")[0]
    .replace(/\/[A-Za-z0-9_-]{10,}(?=\/|$)/g, "/:id")
    .replace(/\/\d+(?=\/|$)/g, "/:n");
}

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  const normalized = normalizeRoute(route);
  httpRequestsTotal.inc({ method, route: normalized, status_code: statusCode.toString() });
  httpRequestDuration.observe({ method, route: normalized }, durationMs / 1000);
}

export function recordSlotsExtracted(types: readonly string[]): void {
  if (!METRICS_ENABLED) return;
  for (const type of types) {
    slotsExtractedTotal.inc({ type });
  }
}

export function recordInference(outcome: "used" | "ignored" | "unavailable"): void {
  if (!METRICS_ENABLED) return;
  classifierInferenceTotal.inc({ outcome });
}

export function recordValidationRejection(type: string): void {
  if (!METRICS_ENABLED) return;
  validationRejectionsTotal.inc({ type });
}

export function recordSessionCompleted(): void {
  if (!METRICS_ENABLED) return;
  sessionsCompletedTotal.inc();
}

export function recordAssembly(outcome: "success" | "incomplete"): void {
  if (!METRICS_ENABLED) return;
  assembliesTotal.inc({ outcome });
}
