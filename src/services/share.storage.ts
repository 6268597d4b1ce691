/**
 * Local Disk Storage Adapter
 * Implementation of ShareStorage on the filesystem under a single root
 *
 * Blobs are written once (exclusive create) and never modified in place.
 * Uploads land under a staging key first and are moved to their final,
 * token-derived key with link + unlink, which refuses to overwrite.
 */

import { link, mkdir, open, readdir, rm, stat, unlink } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { basename, join, relative, resolve, isAbsolute } from 'path';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';

import type { BlobHandle } from '../types/index.js';

import { StorageError, isStorageError } from './share.errors.js';
import type { ShareStorage } from './share.service.js';

export const STAGING_PREFIX = '.staging-';

const MAX_FILENAME_LENGTH = 200;
const FALLBACK_FILENAME = 'file';

/**
 * Local storage configuration
 */
export interface LocalStorageConfig {
  root: string;
  maxBytes: number;
}

/**
 * Reduce an uploaded filename to a safe single path segment.
 * Only the basename survives; traversal and control characters are dropped.
 */
export function sanitizeFilename(filename: string): string {
  const lastSegment = filename.split(/[\\/]/).pop() ?? '';
  const cleaned = lastSegment
    // eslint-disable-next-line no-control-regex
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/\.{2,}/g, '.')
    .replace(/^[.\s]+/, '')
    .trim()
    .slice(0, MAX_FILENAME_LENGTH);

  return cleaned === '' ? FALLBACK_FILENAME : cleaned;
}

/**
 * Storage key for a share: token first, so keys are unique per token
 */
export function buildStorageKey(token: string, filename: string): string {
  return `${token}-${sanitizeFilename(filename)}`;
}

export function buildStagingKey(id: string): string {
  return `${STAGING_PREFIX}${id}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Pass-through stream that fails once more than maxBytes have gone by
 */
function createByteLimit(maxBytes: number): {
  limiter: Transform;
  bytesSeen: () => number;
} {
  let total = 0;

  const limiter = new Transform({
    transform(chunk: Uint8Array, _encoding, callback) {
      total += chunk.byteLength;
      if (total > maxBytes) {
        callback(
          new StorageError(
            'QUOTA_EXCEEDED',
            `Upload exceeds the ${maxBytes} byte limit`
          )
        );
        return;
      }
      callback(null, chunk);
    },
  });

  return { limiter, bytesSeen: () => total };
}

/**
 * Create local disk storage adapter
 */
export function createLocalShareStorage(
  config: LocalStorageConfig
): ShareStorage {
  const root = resolve(config.root);

  /**
   * Map a key to a path, refusing anything that is not a single segment
   * inside the root
   */
  function resolveKey(key: string): string {
    if (
      key === '' ||
      key === '.' ||
      key === '..' ||
      key.includes('/') ||
      key.includes('\\') ||
      key.includes('\0') ||
      basename(key) !== key
    ) {
      throw new StorageError('INVALID_KEY', `Invalid storage key: ${key}`);
    }

    const fullPath = join(root, key);
    const rel = relative(root, fullPath);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new StorageError('INVALID_KEY', `Invalid storage key: ${key}`);
    }
    return fullPath;
  }

  return {
    /**
     * Stream bytes into a new blob. The partial file is removed on any failure.
     */
    async put(key: string, source: AsyncIterable<Uint8Array>): Promise<number> {
      const target = resolveKey(key);
      await mkdir(root, { recursive: true });

      let handle: FileHandle;
      try {
        handle = await open(target, 'wx');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          // Never touch a blob we did not write
          throw new StorageError('CONFLICT', `Blob already exists: ${key}`);
        }
        throw error;
      }

      const { limiter, bytesSeen } = createByteLimit(config.maxBytes);

      try {
        await pipeline(source, limiter, handle.createWriteStream());
      } catch (error) {
        await rm(target, { force: true });
        throw error;
      }

      return bytesSeen();
    },

    /**
     * Open a blob for reading. The descriptor stays valid if the path is
     * unlinked while the stream is still being consumed.
     */
    async get(key: string): Promise<BlobHandle> {
      const target = resolveKey(key);

      let handle: FileHandle;
      try {
        handle = await open(target, 'r');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          throw new StorageError('NOT_FOUND', `Blob not found: ${key}`);
        }
        throw error;
      }

      try {
        const { size } = await handle.stat();
        return { stream: handle.createReadStream(), sizeBytes: size };
      } catch (error) {
        await handle.close();
        throw error;
      }
    },

    /**
     * Move a blob to a new key without overwriting an existing one
     */
    async move(fromKey: string, toKey: string): Promise<void> {
      const from = resolveKey(fromKey);
      const to = resolveKey(toKey);

      try {
        await link(from, to);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          throw new StorageError('CONFLICT', `Blob already exists: ${toKey}`);
        }
        if (isErrnoException(error) && error.code === 'ENOENT') {
          throw new StorageError('NOT_FOUND', `Blob not found: ${fromKey}`);
        }
        throw error;
      }
      await unlink(from);
    },

    /**
     * Delete a blob. Missing keys are a no-op.
     */
    async delete(key: string): Promise<void> {
      await rm(resolveKey(key), { force: true });
    },

    async exists(key: string): Promise<boolean> {
      try {
        const info = await stat(resolveKey(key));
        return info.isFile();
      } catch (error) {
        if (isStorageError(error)) {
          throw error;
        }
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return false;
        }
        throw error;
      }
    },

    /**
     * Remove staging blobs abandoned by crashed uploads
     */
    async removeStaleStaging(olderThan: Date): Promise<number> {
      let entries: string[];
      try {
        entries = await readdir(root);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return 0;
        }
        throw error;
      }

      let removed = 0;
      for (const entry of entries) {
        if (!entry.startsWith(STAGING_PREFIX)) {
          continue;
        }
        const fullPath = join(root, entry);
        try {
          const info = await stat(fullPath);
          if (info.mtime.getTime() < olderThan.getTime()) {
            await rm(fullPath, { force: true });
            removed += 1;
          }
        } catch (error) {
          // An upload may finish (and move its blob) between readdir and stat
          if (isErrnoException(error) && error.code === 'ENOENT') {
            continue;
          }
          throw error;
        }
      }
      return removed;
    },
  };
}
