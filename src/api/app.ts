/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { ActorContext, SharePolicy } from '../types/index.js';

import type { PrincipalResolver } from './middleware/auth.js';
import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import type { RateLimiter, RateLimitConfig } from './middleware/rateLimit.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createDownloadRoutes } from './routes/download.js';
import { createHealthRoutes } from './routes/health.js';
import { createPublicRoutes } from './routes/public.js';
import type { PublicInfo } from './routes/public.js';
import { createShareRoutes } from './routes/shares.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
export interface AppConfig {
  services: ApiServices;
  principalResolver: PrincipalResolver;
  policy: SharePolicy;
  branding: Pick<PublicInfo, 'title' | 'subtitle'>;
  authDisabled?: boolean;
  publicBaseUrl?: string | null;
  allowedOrigins?: string[];
  /** Throttles GET /share/:token; unthrottled when absent */
  downloadRateLimit?: {
    limiter: RateLimiter;
    config: RateLimitConfig;
  };
  storageCheck?: () => Promise<void>;
}

function requestIdOf(c: Context): string {
  const actor: ActorContext | undefined = c.get('actor');
  return actor?.requestId ?? 'unknown';
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, principalResolver, policy } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: config.allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
      exposeHeaders: ['Content-Disposition', 'Content-Length'],
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.use('/api/v1/config', publicMiddleware);
  app.route(
    '/api/v1',
    createHealthRoutes(
      config.storageCheck !== undefined
        ? { storageCheck: config.storageCheck }
        : undefined
    )
  );

  // Download: the token is the credential
  app.use('/share/*', publicMiddleware);
  if (config.downloadRateLimit !== undefined) {
    app.use(
      '/share/*',
      createRateLimitMiddleware(
        config.downloadRateLimit.limiter,
        config.downloadRateLimit.config
      )
    );
  }
  app.route(
    '/',
    createDownloadRoutes({ accessService: services.accessService })
  );

  // Optional auth: signed-in status
  app.use(
    '/api/v1/me',
    createAuthMiddleware({ resolver: principalResolver, required: false })
  );
  app.route(
    '/api/v1',
    createPublicRoutes({
      info: {
        title: config.branding.title,
        subtitle: config.branding.subtitle,
        policy,
        authDisabled: config.authDisabled ?? false,
      },
    })
  );

  // Protected routes
  const authMiddleware = createAuthMiddleware({ resolver: principalResolver });
  app.use('/api/v1/shares/*', authMiddleware);
  app.use('/api/v1/shares', authMiddleware);
  app.use('/api/v1/uploads/*', authMiddleware);
  app.route(
    '/api/v1',
    createShareRoutes({
      shareService: services.shareService,
      progress: services.progress,
      policy,
      publicBaseUrl: config.publicBaseUrl ?? null,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: requestIdOf(c),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: requestIdOf(c),
        },
      },
      500
    );
  });

  return app;
}
