/**
 * Download Route
 * Public endpoint: the share token is the only credential
 */

import { Readable } from 'stream';

import { Hono } from 'hono';
import { stream } from 'hono/streaming';

import type { ShareAccessService } from '../../services/share-access.service.js';
import { errorResponse, getRequestId } from '../utils/response.js';

/**
 * Percent-encode for an RFC 5987 ext-value
 */
function encodeExtValue(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Content-Disposition with an ASCII fallback name and the exact UTF-8 name
 */
export function buildContentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(filename)}`;
}

/**
 * Create download routes
 */
export function createDownloadRoutes(deps: {
  accessService: ShareAccessService;
}): Hono {
  const { accessService } = deps;
  const app = new Hono();

  /**
   * GET /share/:token
   * Stream the file. The download slot is taken before the first byte.
   */
  app.get('/share/:token', async (c) => {
    const requestId = getRequestId(c);
    const result = await accessService.download(c.req.param('token'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const { share, stream: body, sizeBytes } = result.data;

    c.header('Content-Type', 'application/octet-stream');
    c.header('Content-Length', sizeBytes.toString());
    c.header('Content-Disposition', buildContentDisposition(share.filename));
    c.header('Cache-Control', 'no-store');
    c.header('X-Content-Type-Options', 'nosniff');

    return stream(
      c,
      async (out) => {
        out.onAbort(() => {
          body.destroy();
        });
        await out.pipe(Readable.toWeb(body));
      },
      async (error) => {
        console.error(`Download of share ${share.id} failed mid-stream:`, error);
        body.destroy();
      }
    );
  });

  return app;
}
