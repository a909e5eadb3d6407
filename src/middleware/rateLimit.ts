// src/middleware/rateLimit.ts
// Rate limiting for endpoints that may call a model provider.

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Per-client limits. Processing is only expensive when semantic inference
 * is enabled, so it is the only limited route.
 */
export const RATE_LIMITS = {
  process: { max: 20, timeWindow: '1 hour' },
} as const;

export type RateLimitedRoute = keyof typeof RATE_LIMITS;

/**
 * Client identifier for rate limiting.
 * Priority: x-client-id header > IP address
 */
function getClientKey(request: FastifyRequest): string {
  const clientId = request.headers['x-client-id'];
  if (clientId && typeof clientId === 'string') {
    return `client:${clientId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin with Fastify.
 * Call this before route registration.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    // Don't apply globally - configured per route
    global: false,
    max: 100,
    timeWindow: '1 hour',
    keyGenerator: getClientKey,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}

/**
 * Route options for a limited route; empty when limiting is off.
 */
export function getRateLimitConfig(route: RateLimitedRoute, enabled = true) {
  if (!enabled) return {};
  return {
    config: {
      rateLimit: RATE_LIMITS[route],
    },
  };
}
