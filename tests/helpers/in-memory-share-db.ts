/**
 * In-memory ShareDb
 *
 * Stands in for the Postgres adapter in behaviour tests. Every method is a
 * single synchronous step behind an async boundary, which gives the same
 * guarantees as the conditional UPDATE/DELETE statements: consumeDownload
 * and deleteShareIfReclaimable are atomic with respect to each other.
 */

import { randomUUID } from 'crypto';

import { ShareConflictError } from '@/services/share.errors.js';
import type { ShareDb } from '@/services/share.service.js';
import type {
  ConsumeResult,
  CreateShareParams,
  FileShare,
  ListSharesParams,
  PaginatedResult,
} from '@/types/index.js';
import { getShareState, isReclaimable } from '@/types/index.js';

export interface InMemoryShareDb extends ShareDb {
  /** Current row, or undefined when it does not exist */
  peek: (id: string) => FileShare | undefined;
  /** Insert a row directly, bypassing createShare */
  seed: (share: FileShare) => void;
  count: () => number;
}

function copy(share: FileShare): FileShare {
  return {
    ...share,
    createdAt: new Date(share.createdAt.getTime()),
    expiresAt: new Date(share.expiresAt.getTime()),
  };
}

export function createInMemoryShareDb(
  options: { now?: () => Date } = {}
): InMemoryShareDb {
  const now = options.now ?? (() => new Date());
  const rows = new Map<string, FileShare>();

  function findByToken(token: string): FileShare | undefined {
    for (const row of rows.values()) {
      if (row.token === token) {
        return row;
      }
    }
    return undefined;
  }

  return {
    peek(id) {
      const row = rows.get(id);
      return row === undefined ? undefined : copy(row);
    },

    seed(share) {
      rows.set(share.id, copy(share));
    },

    count() {
      return rows.size;
    },

    async createShare(params: CreateShareParams): Promise<FileShare> {
      if (findByToken(params.token) !== undefined) {
        throw new ShareConflictError();
      }
      const row: FileShare = {
        id: randomUUID(),
        ...params,
        createdAt: now(),
        downloadCount: 0,
      };
      rows.set(row.id, row);
      return copy(row);
    },

    async getShareById(id: string): Promise<FileShare | null> {
      const row = rows.get(id);
      return row === undefined ? null : copy(row);
    },

    async getShareByToken(token: string): Promise<FileShare | null> {
      const row = findByToken(token);
      return row === undefined ? null : copy(row);
    },

    async listSharesByOwner(
      ownerId: string,
      params: ListSharesParams,
      at: Date
    ): Promise<PaginatedResult<FileShare>> {
      const cursor = params.cursor === undefined ? null : new Date(params.cursor);
      const matching = [...rows.values()]
        .filter((row) => row.ownerId === ownerId)
        .filter(
          (row) =>
            params.includeInactive === true ||
            getShareState(row, at) === 'active'
        )
        .filter(
          (row) =>
            cursor === null || row.createdAt.getTime() < cursor.getTime()
        )
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

      const items = matching.slice(0, params.limit).map(copy);
      const hasMore = matching.length > params.limit;
      const result: PaginatedResult<FileShare> = { items, hasMore };
      const last = items[items.length - 1];
      if (hasMore && last !== undefined) {
        result.nextCursor = last.createdAt.toISOString();
      }
      return result;
    },

    async consumeDownload(id: string, at: Date): Promise<ConsumeResult | null> {
      const row = rows.get(id);
      if (row === undefined || getShareState(row, at) !== 'active') {
        return null;
      }
      row.downloadCount += 1;
      return {
        share: copy(row),
        exhausted:
          row.maxDownloads !== null && row.downloadCount >= row.maxDownloads,
      };
    },

    async deleteShare(id: string): Promise<void> {
      rows.delete(id);
    },

    async deleteShareIfReclaimable(id: string, at: Date): Promise<boolean> {
      const row = rows.get(id);
      if (row === undefined || !isReclaimable(row, at)) {
        return false;
      }
      rows.delete(id);
      return true;
    },

    async listExpiredOrExhausted(at: Date, limit: number): Promise<FileShare[]> {
      return [...rows.values()]
        .filter((row) => isReclaimable(row, at))
        .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
        .slice(0, limit)
        .map(copy);
    },
  };
}
