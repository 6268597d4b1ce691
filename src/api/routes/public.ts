/**
 * Public Info Routes
 * What the front end needs before the user does anything
 */

import { Hono } from 'hono';

import type { SharePolicy } from '../../types/index.js';
import { getActor, getRequestId, successResponse } from '../utils/response.js';

export interface PublicInfo {
  title: string;
  subtitle: string;
  policy: SharePolicy;
  authDisabled: boolean;
}

/**
 * Create public info routes
 */
export function createPublicRoutes(deps: { info: PublicInfo }): Hono {
  const { info } = deps;
  const app = new Hono();

  /**
   * GET /config
   * Branding and upload limits
   */
  app.get('/config', (c) => {
    return successResponse(
      c,
      {
        title: info.title,
        subtitle: info.subtitle,
        maxUploadBytes: info.policy.maxUploadBytes,
        minRetentionDays: info.policy.minRetentionDays,
        maxRetentionDays: info.policy.maxRetentionDays,
        authDisabled: info.authDisabled,
      },
      getRequestId(c)
    );
  });

  /**
   * GET /me
   * Whether the caller is signed in (auth optional on this route)
   */
  app.get('/me', (c) => {
    const actor = getActor(c);
    return successResponse(
      c,
      {
        authenticated: actor.type === 'user',
        userId: actor.userId ?? null,
      },
      getRequestId(c)
    );
  });

  return app;
}
