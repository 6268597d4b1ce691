/**
 * Share Routes
 * Owner-facing endpoints: upload, "my files", delete, upload progress
 *
 * Uploads are the raw request body (not multipart), so bytes stream to disk
 * and the size limit is enforced while they arrive.
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ShareService } from '../../services/share.service.js';
import type { UploadProgressTracker } from '../../services/upload-progress.js';
import { getProgressPercent } from '../../services/upload-progress.js';
import type { FileShare, SharePolicy } from '../../types/index.js';
import { getShareState } from '../../types/index.js';
import {
  errorResponse,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';

interface ShareRoutesDeps {
  shareService: ShareService;
  progress: UploadProgressTracker;
  policy: SharePolicy;
  /** Base for share links; defaults to the request origin */
  publicBaseUrl?: string | null;
  now?: () => Date;
}

const UPLOAD_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// Zod Schemas
const uploadQuerySchema = z.object({
  filename: z.string({ required_error: 'filename is required' }).min(1, 'filename is required'),
  retentionDays: z.coerce.number().optional(),
  maxDownloads: z.coerce.number().optional(),
});

const listQuerySchema = z.object({
  cursor: z.string().datetime().optional(),
  limit: z.coerce.number().int().optional(),
  includeInactive: z.enum(['true', 'false']).optional(),
});

const shareIdSchema = z.string().uuid();

/**
 * Treat empty query values as absent
 */
function optionalParam(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Adapt a web ReadableStream to the byte source the service consumes.
 * Stopping early (size limit) cancels the request body.
 */
async function* readBody(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

function toShareView(share: FileShare, now: Date) {
  return {
    id: share.id,
    filename: share.filename,
    token: share.token,
    sizeBytes: share.sizeBytes,
    createdAt: share.createdAt.toISOString(),
    expiresAt: share.expiresAt.toISOString(),
    maxDownloads: share.maxDownloads,
    downloadCount: share.downloadCount,
    state: getShareState(share, now),
  };
}

/**
 * Create share routes
 */
export function createShareRoutes(deps: ShareRoutesDeps): Hono {
  const { shareService, progress, policy } = deps;
  const now = deps.now ?? (() => new Date());
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /shares?filename=&retentionDays=&maxDownloads=
   * Body: the file bytes. Optional X-Upload-Id header enables progress polling.
   */
  app.post('/shares', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const parsed = uploadQuerySchema.safeParse({
      filename: optionalParam(c.req.query('filename')),
      retentionDays: optionalParam(c.req.query('retentionDays')),
      maxDownloads: optionalParam(c.req.query('maxDownloads')),
    });

    if (!parsed.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: parsed.error.issues[0]?.message ?? 'Invalid upload parameters',
        },
        requestId
      );
    }

    const uploadId = c.req.header('x-upload-id');
    if (uploadId !== undefined && !UPLOAD_ID_PATTERN.test(uploadId)) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Invalid X-Upload-Id header' },
        requestId
      );
    }

    // Refuse early when the client already told us it is too big
    const declaredLength = Number(c.req.header('content-length'));
    if (Number.isFinite(declaredLength) && declaredLength > policy.maxUploadBytes) {
      return errorResponse(
        c,
        {
          code: 'QUOTA_EXCEEDED',
          message: 'File exceeds maximum allowed size',
          details: { maxBytes: policy.maxUploadBytes },
        },
        requestId
      );
    }

    const body = c.req.raw.body;
    if (body === null) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Request body is required' },
        requestId
      );
    }

    const result = await shareService.upload(actor, {
      source: readBody(body),
      filename: parsed.data.filename,
      retentionDays: parsed.data.retentionDays ?? policy.minRetentionDays,
      maxDownloads: parsed.data.maxDownloads ?? null,
      ...(uploadId !== undefined && { uploadId }),
      ...(Number.isFinite(declaredLength) && { expectedBytes: declaredLength }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const baseUrl = deps.publicBaseUrl ?? new URL(c.req.url).origin;

    return successResponse(
      c,
      {
        id: result.data.id,
        token: result.data.token,
        filename: result.data.filename,
        sizeBytes: result.data.sizeBytes,
        expiresAt: result.data.expiresAt.toISOString(),
        maxDownloads: result.data.maxDownloads,
        shareUrl: `${baseUrl}/share/${result.data.token}`,
      },
      requestId,
      201
    );
  });

  // ─────────────────────────────────────────────────────────────
  // LIST MY SHARES
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /shares
   * The caller's shares, newest first
   */
  app.get('/shares', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const parsed = listQuerySchema.safeParse({
      cursor: optionalParam(c.req.query('cursor')),
      limit: optionalParam(c.req.query('limit')),
      includeInactive: optionalParam(c.req.query('includeInactive')),
    });

    if (!parsed.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Invalid list parameters' },
        requestId
      );
    }

    const result = await shareService.listMyShares(actor, {
      ...(parsed.data.cursor !== undefined && { cursor: parsed.data.cursor }),
      ...(parsed.data.limit !== undefined && { limit: parsed.data.limit }),
      includeInactive: parsed.data.includeInactive === 'true',
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const at = now();
    return successResponse(
      c,
      {
        items: result.data.items.map((share) => toShareView(share, at)),
        nextCursor: result.data.nextCursor ?? null,
        hasMore: result.data.hasMore,
      },
      requestId
    );
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE SHARE
  // ─────────────────────────────────────────────────────────────

  /**
   * DELETE /shares/:id
   * Remove a share and its file now
   */
  app.delete('/shares/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const shareId = c.req.param('id');
    if (!shareIdSchema.safeParse(shareId).success) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Share not found' },
        requestId
      );
    }

    const result = await shareService.deleteShare(actor, shareId);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { success: true }, requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // UPLOAD PROGRESS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /uploads/:uploadId/progress
   * Bytes received so far for an upload still in flight
   */
  app.get('/uploads/:uploadId/progress', (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const entry = progress.get(c.req.param('uploadId'));
    if (entry === null || entry.ownerId !== actor.userId) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'No upload in progress' },
        requestId
      );
    }

    return successResponse(
      c,
      {
        uploadId: entry.uploadId,
        receivedBytes: entry.receivedBytes,
        expectedBytes: entry.expectedBytes,
        percent: getProgressPercent(entry),
      },
      requestId
    );
  });

  return app;
}
