/**
 * ShareService Implementation
 *
 * SCOPE: Creating shares (upload) and the owner's view of them (list, delete)
 * NOT IN SCOPE: Serving downloads (ShareAccessService), sweeping (cleanup worker)
 *
 * GUARDRAILS:
 * - Only authenticated users upload, list or delete
 * - Input is validated before any byte is stored
 * - Upload is all-or-nothing: a descriptor exists only with its blob
 * - Owners only see and delete their own shares
 */

import type {
  ActorContext,
  BlobHandle,
  ConsumeResult,
  CreateShareParams,
  FileShare,
  ListSharesParams,
  PaginatedResult,
  Result,
  SharePolicy,
  ShareResult,
  UploadShareParams,
} from '../types/index.js';
import {
  DEFAULT_SHARE_POLICY,
  failure,
  normalizeListParams,
  success,
} from '../types/index.js';

import { ShareConflictError, isStorageError } from './share.errors.js';
import { reclaimShare } from './share.reclaim.js';
import {
  buildStagingKey,
  buildStorageKey,
  sanitizeFilename,
} from './share.storage.js';
import type { TokenIssuer } from './share-token.js';
import type { UploadProgressTracker } from './upload-progress.js';
import { withProgress } from './upload-progress.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Token collisions are retried this many times before giving up
 */
export const MAX_TOKEN_ATTEMPTS = 3;

/**
 * Database abstraction interface for share descriptors
 */
export interface ShareDb {
  createShare: (params: CreateShareParams) => Promise<FileShare>;
  getShareById: (id: string) => Promise<FileShare | null>;
  getShareByToken: (token: string) => Promise<FileShare | null>;
  listSharesByOwner: (
    ownerId: string,
    params: ListSharesParams,
    now: Date
  ) => Promise<PaginatedResult<FileShare>>;
  /**
   * Atomically take one download slot. null when none is left, the share
   * expired at `now`, or it no longer exists.
   */
  consumeDownload: (id: string, now: Date) => Promise<ConsumeResult | null>;
  deleteShare: (id: string) => Promise<void>;
  deleteShareIfReclaimable: (id: string, now: Date) => Promise<boolean>;
  listExpiredOrExhausted: (now: Date, limit: number) => Promise<FileShare[]>;
}

/**
 * Blob storage abstraction interface
 */
export interface ShareStorage {
  put: (key: string, source: AsyncIterable<Uint8Array>) => Promise<number>;
  get: (key: string) => Promise<BlobHandle>;
  move: (fromKey: string, toKey: string) => Promise<void>;
  delete: (key: string) => Promise<void>;
  exists: (key: string) => Promise<boolean>;
  removeStaleStaging: (olderThan: Date) => Promise<number>;
}

/**
 * ShareService interface
 */
export interface ShareService {
  upload(
    actor: ActorContext,
    params: UploadShareParams
  ): Promise<Result<ShareResult>>;
  listMyShares(
    actor: ActorContext,
    params: Partial<ListSharesParams>
  ): Promise<Result<PaginatedResult<FileShare>>>;
  deleteShare(actor: ActorContext, shareId: string): Promise<Result<void>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function getUserId(actor: ActorContext): string | null {
  if (actor.type !== 'user' || actor.userId === undefined) {
    return null;
  }
  return actor.userId;
}

function validateUpload(
  params: UploadShareParams,
  policy: SharePolicy
): string | null {
  if (params.filename.trim() === '') {
    return 'filename is required';
  }
  if (
    !Number.isInteger(params.retentionDays) ||
    params.retentionDays < policy.minRetentionDays ||
    params.retentionDays > policy.maxRetentionDays
  ) {
    return `retentionDays must be a whole number between ${policy.minRetentionDays} and ${policy.maxRetentionDays}`;
  }
  const { maxDownloads } = params;
  if (
    maxDownloads !== undefined &&
    maxDownloads !== null &&
    (!Number.isInteger(maxDownloads) || maxDownloads <= 0)
  ) {
    return 'maxDownloads must be a positive whole number';
  }
  return null;
}

function toShareResult(share: FileShare): ShareResult {
  return {
    id: share.id,
    token: share.token,
    filename: share.filename,
    sizeBytes: share.sizeBytes,
    expiresAt: share.expiresAt,
    maxDownloads: share.maxDownloads,
  };
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create ShareService instance
 */
export function createShareService(deps: {
  db: ShareDb;
  storage: ShareStorage;
  tokens: TokenIssuer;
  policy?: SharePolicy;
  progress?: UploadProgressTracker;
  now?: () => Date;
}): ShareService {
  const { db, storage, tokens, progress } = deps;
  const policy = deps.policy ?? DEFAULT_SHARE_POLICY;
  const now = deps.now ?? (() => new Date());

  /**
   * Best-effort removal on a failure path; the first failure is what the
   * caller needs to see
   */
  async function discardBlob(key: string): Promise<void> {
    try {
      await storage.delete(key);
    } catch (error) {
      console.error(`Failed to discard blob ${key}:`, error);
    }
  }

  /**
   * Move the staged blob under a fresh token and insert its descriptor,
   * retrying on token collisions
   */
  async function commitShare(
    stagingKey: string,
    base: Omit<CreateShareParams, 'token' | 'storageKey'>
  ): Promise<Result<ShareResult>> {
    let currentKey = stagingKey;

    try {
      for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
        const token = tokens.issue();
        const storageKey = buildStorageKey(token, base.filename);

        try {
          await storage.move(currentKey, storageKey);
        } catch (error) {
          if (isStorageError(error, 'CONFLICT')) {
            console.error(`Storage key collision on attempt ${attempt}`);
            continue;
          }
          throw error;
        }
        currentKey = storageKey;

        try {
          const share = await db.createShare({ ...base, token, storageKey });
          return success(toShareResult(share));
        } catch (error) {
          if (!(error instanceof ShareConflictError)) {
            throw error;
          }
          console.error(`Share token collision on attempt ${attempt}`);
        }
      }
    } catch (error) {
      console.error('Failed to create share:', error);
      await discardBlob(currentKey);
      return failure('INTERNAL_ERROR', 'Failed to create share');
    }

    await discardBlob(currentKey);
    return failure(
      'INTERNAL_ERROR',
      'Could not allocate a unique share token'
    );
  }

  return {
    /**
     * Upload a file and create its share
     * Bytes go to a staging key, then move under the issued token
     */
    async upload(
      actor: ActorContext,
      params: UploadShareParams
    ): Promise<Result<ShareResult>> {
      const ownerId = getUserId(actor);
      if (ownerId === null) {
        return failure('UNAUTHORIZED', 'Authentication required to upload');
      }

      const validationError = validateUpload(params, policy);
      if (validationError !== null) {
        return failure('VALIDATION_ERROR', validationError);
      }

      const filename = sanitizeFilename(params.filename);
      const stagingKey = buildStagingKey(tokens.issue());
      const { uploadId } = params;

      let source = params.source;
      if (progress !== undefined && uploadId !== undefined) {
        progress.start(uploadId, ownerId, params.expectedBytes ?? null);
        source = withProgress(params.source, (bytes) =>
          progress.advance(uploadId, bytes)
        );
      }

      try {
        let sizeBytes: number;
        try {
          sizeBytes = await storage.put(stagingKey, source);
        } catch (error) {
          if (isStorageError(error, 'QUOTA_EXCEEDED')) {
            return failure(
              'QUOTA_EXCEEDED',
              'File exceeds maximum allowed size',
              { maxBytes: policy.maxUploadBytes }
            );
          }
          console.error('Failed to store upload:', error);
          return failure('INTERNAL_ERROR', 'Failed to store file');
        }

        const expiresAt = new Date(
          now().getTime() + params.retentionDays * DAY_MS
        );

        return await commitShare(stagingKey, {
          ownerId,
          filename,
          sizeBytes,
          expiresAt,
          maxDownloads: params.maxDownloads ?? null,
        });
      } finally {
        if (progress !== undefined && uploadId !== undefined) {
          progress.finish(uploadId);
        }
      }
    },

    /**
     * List the caller's shares, newest first
     */
    async listMyShares(
      actor: ActorContext,
      params: Partial<ListSharesParams>
    ): Promise<Result<PaginatedResult<FileShare>>> {
      const ownerId = getUserId(actor);
      if (ownerId === null) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }

      try {
        const page = await db.listSharesByOwner(
          ownerId,
          normalizeListParams(params),
          now()
        );
        return success(page);
      } catch (error) {
        console.error('Failed to list shares:', error);
        return failure('INTERNAL_ERROR', 'Failed to list shares');
      }
    },

    /**
     * Delete a share and its blob
     * Owner only
     */
    async deleteShare(
      actor: ActorContext,
      shareId: string
    ): Promise<Result<void>> {
      if (shareId.trim() === '') {
        return failure('VALIDATION_ERROR', 'Share ID is required');
      }

      const ownerId = getUserId(actor);
      if (ownerId === null) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }

      try {
        const share = await db.getShareById(shareId);
        if (share === null) {
          return failure('NOT_FOUND', 'Share not found');
        }

        if (share.ownerId !== ownerId) {
          return failure(
            'PERMISSION_DENIED',
            "Cannot delete another user's share"
          );
        }

        await reclaimShare({ db, storage }, share);
        return success(undefined);
      } catch (error) {
        console.error(`Failed to delete share ${shareId}:`, error);
        return failure('INTERNAL_ERROR', 'Failed to delete share');
      }
    },
  };
}
