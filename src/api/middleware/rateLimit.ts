/**
 * Rate Limiting Middleware
 * Slows down token guessing on the public download route
 */

import { getConnInfo } from '@hono/node-server/conninfo';
import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, Next } from 'hono';

import type { ActorContext } from '../../types/index.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to userId, then IP)
   */
  getIdentifier?: (c: Context) => string;

  /**
   * Key anonymous callers by the first X-Forwarded-For hop instead of the
   * socket address. Only safe behind a proxy that overwrites the header.
   */
  trustProxy?: boolean;
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the window resets */
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

/**
 * Default rate limit config
 */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  limit: 60,
  window: 60,
};

/**
 * Peer address of the underlying socket; null outside the Node server
 * (for example under app.request in tests)
 */
function socketAddress(c: Context): string | null {
  const env: unknown = c.env;
  if (typeof env !== 'object' || env === null || !('incoming' in env)) {
    return null;
  }
  return getConnInfo(c).remote.address ?? null;
}

/**
 * Client address for rate limiting
 */
export function getClientAddress(c: Context, trustProxy = false): string {
  if (trustProxy) {
    const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
    if (forwarded) {
      return forwarded;
    }
  }
  return socketAddress(c) ?? 'unknown';
}

/**
 * Get identifier from context
 * Priority: userId > IP > 'unknown'
 */
function createDefaultGetIdentifier(trustProxy: boolean) {
  return (c: Context): string => {
    const actor: ActorContext | undefined = c.get('actor');
    if (actor?.userId) {
      return `user:${actor.userId}`;
    }
    return `ip:${getClientAddress(c, trustProxy)}`;
  };
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG
) {
  const getIdentifier =
    config.getIdentifier ??
    createDefaultGetIdentifier(config.trustProxy ?? false);

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const result = await rateLimiter.limit(getIdentifier(c));

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      const actor: ActorContext | undefined = c.get('actor');
      const requestId: string | undefined =
        actor?.requestId ?? c.get('requestId');

      c.header('Retry-After', result.reset.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: requestId ?? 'unknown',
          },
        },
        429
      );
    }

    return next();
  };
}

/**
 * Wrap an Upstash Ratelimit instance
 * Upstash reports reset as an epoch timestamp in milliseconds.
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>,
  now: () => number = Date.now
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: Math.max(0, Math.ceil((result.reset - now()) / 1000)),
      };
    },
  };
}

/**
 * In-memory limiter; size() is the number of identifiers it still holds
 */
export interface InMemoryRateLimiter extends RateLimiter {
  size: () => number;
}

/**
 * Create in-memory rate limiter (single instance / development)
 */
export function createInMemoryRateLimiter(
  config: RateLimitConfig,
  now: () => number = Date.now
): InMemoryRateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();
  const windowMs = config.window * 1000;
  let nextPurgeAt = now() + windowMs;

  // Drop every finished window, at most once per window
  function purgeExpired(current: number): void {
    if (current < nextPurgeAt) {
      return;
    }
    for (const [key, entry] of store) {
      if (entry.resetAt <= current) {
        store.delete(key);
      }
    }
    nextPurgeAt = current + windowMs;
  }

  return {
    size: () => store.size,

    async limit(identifier: string): Promise<RateLimitResult> {
      const current = now();
      purgeExpired(current);

      let entry = store.get(identifier);

      // Check if window has expired
      if (entry && entry.resetAt <= current) {
        entry = undefined;
        store.delete(identifier);
      }

      if (!entry) {
        entry = { count: 0, resetAt: current + windowMs };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - current) / 1000),
      };
    },
  };
}
