// src/middleware/rateLimit.ts
// Rate limiting for routes that call the model or the indexer

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Per-user limits for routes that call the model or the indexer, per hour.
 * A consistency check calls the model once per related document.
 */
export const AI_RATE_LIMITS = {
  checkConsistency: { max: 10, timeWindow: '1 hour' },
  kbUpload: { max: 60, timeWindow: '1 hour' },
};

/**
 * Rate limit key.
 * Priority: x-user-id > IP address
 */
function getUserKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the plugin before the routes; limits are applied per route
 * through getRateLimitConfig().
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 hour',
    keyGenerator: getUserKey,

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

export function getRateLimitConfig(routeType: keyof typeof AI_RATE_LIMITS) {
  return {
    config: {
      rateLimit: AI_RATE_LIMITS[routeType],
    },
  };
}
