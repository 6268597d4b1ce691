/**
 * File Share Domain Types
 *
 * A share is one uploaded blob plus the descriptor that gates access to it.
 */

import type { Readable } from 'stream';

/**
 * Share descriptor
 */
export interface FileShare {
  id: string;
  ownerId: string;
  /** Display name only; never used as a storage path */
  filename: string;
  token: string;
  storageKey: string;
  sizeBytes: number;
  createdAt: Date;
  expiresAt: Date;
  /** null = no download ceiling (expiry still applies) */
  maxDownloads: number | null;
  downloadCount: number;
}

/**
 * Servability of a share at a given instant
 */
export type ShareState = 'active' | 'expired' | 'exhausted';

/**
 * Expiry wins over exhaustion. The expiry boundary is inclusive.
 */
export function getShareState(share: FileShare, now: Date): ShareState {
  if (share.expiresAt.getTime() <= now.getTime()) {
    return 'expired';
  }
  if (share.maxDownloads !== null && share.downloadCount >= share.maxDownloads) {
    return 'exhausted';
  }
  return 'active';
}

/**
 * Expired or exhausted shares are due for reclamation. Once true this stays
 * true: the clock only advances and downloadCount only grows.
 */
export function isReclaimable(share: FileShare, now: Date): boolean {
  return getShareState(share, now) !== 'active';
}

/**
 * Parameters for inserting a descriptor
 */
export interface CreateShareParams {
  ownerId: string;
  filename: string;
  token: string;
  storageKey: string;
  sizeBytes: number;
  expiresAt: Date;
  maxDownloads: number | null;
}

/**
 * Parameters for uploading a new share
 */
export interface UploadShareParams {
  source: AsyncIterable<Uint8Array>;
  filename: string;
  retentionDays: number;
  maxDownloads?: number | null;
  /** Client-chosen id for progress polling */
  uploadId?: string;
  /** Declared body size, used for progress percentages */
  expectedBytes?: number;
}

/**
 * What the uploader gets back
 */
export interface ShareResult {
  id: string;
  token: string;
  filename: string;
  sizeBytes: number;
  expiresAt: Date;
  maxDownloads: number | null;
}

/**
 * Outcome of taking a download slot
 */
export interface ConsumeResult {
  share: FileShare;
  /** true when this download used the last slot */
  exhausted: boolean;
}

/**
 * An opened blob, ready to stream
 */
export interface BlobHandle {
  stream: Readable;
  sizeBytes: number;
}

/**
 * A granted download
 */
export interface ShareDownload {
  share: FileShare;
  stream: Readable;
  sizeBytes: number;
}

/**
 * Upload policy limits
 */
export interface SharePolicy {
  maxUploadBytes: number;
  minRetentionDays: number;
  maxRetentionDays: number;
}

export const DEFAULT_SHARE_POLICY: SharePolicy = {
  maxUploadBytes: 100 * 1024 * 1024,
  minRetentionDays: 1,
  maxRetentionDays: 30,
};

/**
 * Summary of one cleanup sweep
 */
export interface CleanupSummary {
  scanned: number;
  reclaimed: number;
  failed: number;
  stagingRemoved: number;
}

// ─────────────────────────────────────────────────────────────
// LISTING
// ─────────────────────────────────────────────────────────────

export interface ListSharesParams {
  /** ISO created_at of the last item on the previous page */
  cursor?: string;
  limit: number;
  /** Include expired/exhausted shares not yet swept */
  includeInactive?: boolean;
}

export interface PaginatedResult<T> {
  items: T[];
  nextCursor?: string;
  hasMore: boolean;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Clamp limit into [1, MAX_PAGE_LIMIT]
 */
export function normalizeListParams(
  params: Partial<ListSharesParams>
): ListSharesParams {
  const requested = params.limit ?? DEFAULT_PAGE_LIMIT;
  const limit = Number.isFinite(requested)
    ? Math.min(Math.max(Math.trunc(requested), 1), MAX_PAGE_LIMIT)
    : DEFAULT_PAGE_LIMIT;
  const result: ListSharesParams = { limit };
  if (params.cursor !== undefined && params.cursor !== '') {
    result.cursor = params.cursor;
  }
  if (params.includeInactive === true) {
    result.includeInactive = true;
  }
  return result;
}
