/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

/**
 * Create health check routes
 * storageCheck, when given, must resolve for the service to report ok
 */
export function createHealthRoutes(deps?: {
  storageCheck?: () => Promise<void>;
}): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', async (c) => {
    const timestamp = new Date().toISOString();

    if (deps?.storageCheck !== undefined) {
      try {
        await deps.storageCheck();
      } catch (error) {
        console.error('Health check: storage unavailable:', error);
        return c.json(
          { status: 'degraded', storage: 'unavailable', timestamp, version: 'v1' },
          503
        );
      }
    }

    return c.json({
      status: 'ok',
      timestamp,
      version: 'v1',
    });
  });

  return app;
}
