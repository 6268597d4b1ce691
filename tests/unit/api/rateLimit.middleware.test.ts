/**
 * Rate Limit Middleware Unit Tests
 */

import type { Context, Next } from 'hono';
import { Hono } from 'hono';
import { describe, it, expect, vi } from 'vitest';

import {
  createRateLimitMiddleware,
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
  type RateLimiter,
  type RateLimitConfig,
} from '@/api/middleware/rateLimit.js';
import type { ActorContext } from '@/types/index.js';

import { errorBodySchema, readJson } from '../../helpers/test-utils.js';

function createAnonymous(requestId = 'req-123'): ActorContext {
  return { type: 'anonymous', requestId };
}

// Mock middleware that sets actor
function mockActorMiddleware(actor: ActorContext) {
  return async (c: Context, next: Next) => {
    c.set('actor', actor);
    c.set('requestId', actor.requestId);
    await next();
  };
}

function createMockLimiter(result: {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}) {
  return { limit: vi.fn<RateLimiter['limit']>().mockResolvedValue(result) };
}

function createTestApp(limiter: RateLimiter, actor: ActorContext, config?: RateLimitConfig) {
  const app = new Hono();
  app.use('*', mockActorMiddleware(actor));
  app.use('*', createRateLimitMiddleware(limiter, config));
  app.get('/share/:token', (c) => c.json({ ok: true }));
  return app;
}

describe('Rate Limit Middleware', () => {
  describe('createRateLimitMiddleware', () => {
    it('should allow requests within limit and expose the counters', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, createAnonymous());

      const res = await app.request('/share/abc');

      expect(res.status).toBe(200);
      expect(res.headers.get('X-RateLimit-Limit')).toBe('100');
      expect(res.headers.get('X-RateLimit-Remaining')).toBe('99');
      expect(res.headers.get('X-RateLimit-Reset')).toBe('60');
    });

    it('should block requests exceeding limit with 429 and Retry-After', async () => {
      const limiter = createMockLimiter({ success: false, limit: 100, remaining: 0, reset: 30 });
      const app = createTestApp(limiter, createAnonymous('req-xyz'));

      const res = await app.request('/share/abc');

      expect(res.status).toBe(429);
      expect(res.headers.get('Retry-After')).toBe('30');
      const body = await readJson(res, errorBodySchema);
      expect(body.error).toEqual({
        code: 'RATE_LIMITED',
        message: 'Too many requests',
        details: { retryAfter: 30, limit: 100 },
        requestId: 'req-xyz',
      });
    });

    it('should key anonymous callers by the first forwarded hop behind a trusted proxy', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, createAnonymous(), {
        limit: 100,
        window: 60,
        trustProxy: true,
      });

      await app.request('/share/abc', {
        headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.1' },
      });

      expect(limiter.limit).toHaveBeenCalledWith('ip:203.0.113.7');
    });

    it('should ignore X-Forwarded-For unless the proxy is trusted', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, createAnonymous());

      await app.request('/share/abc', {
        headers: { 'x-forwarded-for': '203.0.113.7' },
      });

      expect(limiter.limit).toHaveBeenCalledWith('ip:unknown');
    });

    it('should key signed-in callers by userId', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, {
        type: 'user',
        userId: 'user-456',
        requestId: 'req-1',
      });

      await app.request('/share/abc');

      expect(limiter.limit).toHaveBeenCalledWith('user:user-456');
    });

    it('should fall back to "unknown" without any address', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, createAnonymous());

      await app.request('/share/abc');

      expect(limiter.limit).toHaveBeenCalledWith('ip:unknown');
    });

    it('should use custom identifier function', async () => {
      const limiter = createMockLimiter({ success: true, limit: 100, remaining: 99, reset: 60 });
      const app = createTestApp(limiter, createAnonymous(), {
        limit: 100,
        window: 60,
        getIdentifier: () => 'custom-id',
      });

      await app.request('/share/abc');

      expect(limiter.limit).toHaveBeenCalledWith('custom-id');
    });
  });

  describe('createInMemoryRateLimiter', () => {
    it('should track requests per identifier', async () => {
      const rateLimiter = createInMemoryRateLimiter({ limit: 3, window: 60 });

      expect((await rateLimiter.limit('test-id')).remaining).toBe(2);
      expect((await rateLimiter.limit('test-id')).remaining).toBe(1);

      const third = await rateLimiter.limit('test-id');
      expect(third.success).toBe(true);
      expect(third.remaining).toBe(0);

      const fourth = await rateLimiter.limit('test-id');
      expect(fourth.success).toBe(false);
      expect(fourth.remaining).toBe(0);
    });

    it('should track different identifiers separately', async () => {
      const rateLimiter = createInMemoryRateLimiter({ limit: 2, window: 60 });

      await rateLimiter.limit('id-1');
      await rateLimiter.limit('id-1');

      expect((await rateLimiter.limit('id-1')).success).toBe(false);

      const other = await rateLimiter.limit('id-2');
      expect(other.success).toBe(true);
      expect(other.remaining).toBe(1);
    });

    it('should evict identifiers whose window has ended', async () => {
      let clock = 1_000_000;
      const rateLimiter = createInMemoryRateLimiter({ limit: 5, window: 60 }, () => clock);

      for (let i = 0; i < 10; i++) {
        await rateLimiter.limit(`ip:10.0.0.${i}`);
      }
      expect(rateLimiter.size()).toBe(10);

      clock += 60_000;
      await rateLimiter.limit('ip:10.0.0.99');

      expect(rateLimiter.size()).toBe(1);
    });

    it('should open a fresh window once the old one ends', async () => {
      let clock = 1_000_000;
      const rateLimiter = createInMemoryRateLimiter({ limit: 1, window: 60 }, () => clock);

      expect((await rateLimiter.limit('id')).success).toBe(true);
      expect((await rateLimiter.limit('id')).success).toBe(false);

      clock += 30_000;
      const blocked = await rateLimiter.limit('id');
      expect(blocked.success).toBe(false);
      expect(blocked.reset).toBe(30);

      clock += 30_000;
      expect((await rateLimiter.limit('id')).success).toBe(true);
    });
  });

  describe('createUpstashRateLimiter', () => {
    it('should convert the epoch-millisecond reset to seconds from now', async () => {
      const upstash = {
        limit: vi.fn().mockResolvedValue({
          success: false,
          limit: 60,
          remaining: 0,
          reset: 1_000_000 + 12_500,
          pending: Promise.resolve(),
        }),
      };
      const rateLimiter = createUpstashRateLimiter(upstash, () => 1_000_000);

      const result = await rateLimiter.limit('ip:1.2.3.4');

      expect(result).toEqual({ success: false, limit: 60, remaining: 0, reset: 13 });
      expect(upstash.limit).toHaveBeenCalledWith('ip:1.2.3.4');
    });
  });

  describe('Integration with Hono', () => {
    it('should work with in-memory rate limiter', async () => {
      const config: RateLimitConfig = { limit: 2, window: 60 };
      const app = createTestApp(createInMemoryRateLimiter(config), createAnonymous(), config);

      expect((await app.request('/share/abc')).status).toBe(200);
      expect((await app.request('/share/abc')).status).toBe(200);
      expect((await app.request('/share/abc')).status).toBe(429);
    });

    it('should not let a rotating X-Forwarded-For escape the limit', async () => {
      const config: RateLimitConfig = { limit: 2, window: 60 };
      const app = createTestApp(createInMemoryRateLimiter(config), createAnonymous(), config);

      const statuses: number[] = [];
      for (let i = 0; i < 4; i++) {
        const res = await app.request('/share/abc', {
          headers: { 'x-forwarded-for': `10.0.0.${i}` },
        });
        statuses.push(res.status);
      }

      expect(statuses).toEqual([200, 200, 429, 429]);
    });
  });
});
