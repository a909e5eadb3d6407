// src/observability/healthCheck.ts
// Health checks for service dependencies, with readiness and liveness probes.

import type { DbAdapter } from "../db/types";
import { withTimeout } from "../utils/withTimeout";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
  };
}

/* ---------- Configuration ---------- */

const HEALTH_CHECK_TIMEOUT = Number(process.env.HEALTH_CHECK_TIMEOUT) || 5000;
const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Health Checks ---------- */

async function checkDatabase(db: DbAdapter): Promise<HealthCheckResult> {
  const start = Date.now();

  try {
    const result = await db.queryOne<{ ok: number }>("SELECT 1 AS ok");

    if (result?.ok === 1) {
      return { status: "up", latency: Date.now() - start };
    }

    return {
      status: "down",
      latency: Date.now() - start,
      error: "Unexpected query result",
    };
  } catch (err) {
    log.error({ err }, "Database health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/* ---------- Combined Health Check ---------- */

export async function getHealthStatus(db: DbAdapter): Promise<HealthStatus> {
  const database = await withTimeout(
    checkDatabase(db),
    HEALTH_CHECK_TIMEOUT,
    (): HealthCheckResult => ({ status: "down", error: "Timeout" })
  );

  return {
    status: database.status === "up" ? "healthy" : "unhealthy",
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { database },
  };
}

/* ---------- Probes ---------- */

/** Readiness: every dependency is reachable */
export async function isReady(db: DbAdapter): Promise<boolean> {
  const health = await getHealthStatus(db);
  return health.status === "healthy";
}

/**
 * Liveness: the process is serving requests. The database is not consulted,
 * so a database outage does not get the process restarted.
 */
export async function isAlive(): Promise<boolean> {
  return true;
}
