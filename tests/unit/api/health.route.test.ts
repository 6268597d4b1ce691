/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import { createHealthRoutes } from '@/api/routes/health.js';

import { readJson } from '../../helpers/test-utils.js';

const healthSchema = z.object({
  status: z.string(),
  timestamp: z.string(),
  version: z.string(),
  storage: z.string().optional(),
});

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status ok', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      const body = await readJson(res, healthSchema);
      expect(body.status).toBe('ok');
      expect(body.version).toBe('v1');
    });

    it('should include an ISO timestamp', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const body = await readJson(await app.request('/api/v1/health'), healthSchema);

      expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
    });

    it('should report ok when the storage check passes', async () => {
      const storageCheck = vi.fn().mockResolvedValue(undefined);
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ storageCheck }));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(storageCheck).toHaveBeenCalledTimes(1);
    });

    it('should report degraded with 503 when storage is unavailable', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const app = new Hono();
      app.route(
        '/api/v1',
        createHealthRoutes({
          storageCheck: vi.fn().mockRejectedValue(new Error('EACCES')),
        })
      );

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(503);
      const body = await readJson(res, healthSchema);
      expect(body.status).toBe('degraded');
      expect(body.storage).toBe('unavailable');
    });
  });
});
