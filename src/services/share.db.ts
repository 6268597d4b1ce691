/**
 * ShareDb Adapter
 * Implements ShareDb using Supabase (Postgres)
 *
 * Schema and functions: supabase/migrations/001_file_shares.sql
 * The download-slot increment and the conditional delete run inside Postgres
 * functions so each is a single atomic statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  ConsumeResult,
  CreateShareParams,
  FileShare,
  ListSharesParams,
  PaginatedResult,
} from '../types/index.js';

import { ShareConflictError } from './share.errors.js';
import type { ShareDb } from './share.service.js';

const TABLE = 'file_shares';

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';
/** PostgREST: no rows for .single() */
const NO_ROWS = 'PGRST116';
// invalid_text_representation: an id that is not a UUID matches nothing
const INVALID_ID = '22P02';

/**
 * Database row shape
 */
const fileShareRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  filename: z.string(),
  token: z.string(),
  storage_key: z.string(),
  size_bytes: z.coerce.number(),
  created_at: z.string(),
  expires_at: z.string(),
  max_downloads: z.number().int().nullable(),
  download_count: z.number().int(),
});

type FileShareRow = z.infer<typeof fileShareRowSchema>;

/**
 * Map database row to FileShare entity
 */
function mapRowToShare(row: FileShareRow): FileShare {
  return {
    id: row.id,
    ownerId: row.owner_id,
    filename: row.filename,
    token: row.token,
    storageKey: row.storage_key,
    sizeBytes: row.size_bytes,
    createdAt: new Date(row.created_at),
    expiresAt: new Date(row.expires_at),
    maxDownloads: row.max_downloads,
    downloadCount: row.download_count,
  };
}

function parseRow(data: unknown): FileShare {
  return mapRowToShare(fileShareRowSchema.parse(data));
}

function parseRows(data: unknown): FileShare[] {
  return z.array(fileShareRowSchema).parse(data ?? []).map(mapRowToShare);
}

/**
 * Create ShareDb implementation using Supabase
 */
export function createShareDb(supabase: SupabaseClient): ShareDb {
  async function getOne(
    column: 'id' | 'token',
    value: string
  ): Promise<FileShare | null> {
    const { data, error } = await supabase
      .from(TABLE)
      .select('*')
      .eq(column, value)
      .single();

    if (error !== null) {
      if (error.code === NO_ROWS || error.code === INVALID_ID) {
        return null;
      }
      throw new Error(`Failed to get share: ${error.message}`);
    }

    return parseRow(data);
  }

  return {
    /**
     * Insert a descriptor; token collisions surface as ShareConflictError
     */
    async createShare(params: CreateShareParams): Promise<FileShare> {
      const { data, error } = await supabase
        .from(TABLE)
        .insert({
          owner_id: params.ownerId,
          filename: params.filename,
          token: params.token,
          storage_key: params.storageKey,
          size_bytes: params.sizeBytes,
          expires_at: params.expiresAt.toISOString(),
          max_downloads: params.maxDownloads,
          download_count: 0,
        })
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          throw new ShareConflictError(error.message);
        }
        throw new Error(`Failed to create share: ${error.message}`);
      }

      return parseRow(data);
    },

    async getShareById(id: string): Promise<FileShare | null> {
      return getOne('id', id);
    },

    async getShareByToken(token: string): Promise<FileShare | null> {
      return getOne('token', token);
    },

    /**
     * List shares for an owner, newest first
     */
    async listSharesByOwner(
      ownerId: string,
      params: ListSharesParams,
      now: Date
    ): Promise<PaginatedResult<FileShare>> {
      let query = supabase
        .from(TABLE)
        .select('*')
        .eq('owner_id', ownerId)
        .order('created_at', { ascending: false });

      if (params.includeInactive !== true) {
        query = query
          .gt('expires_at', now.toISOString())
          .eq('is_exhausted', false);
      }

      // Cursor is the created_at of the last item
      if (params.cursor !== undefined) {
        query = query.lt('created_at', params.cursor);
      }

      // Fetch one extra to check hasMore
      query = query.limit(params.limit + 1);

      const { data, error } = await query;

      if (error !== null) {
        throw new Error(`Failed to list shares: ${error.message}`);
      }

      const rows = parseRows(data);
      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit);

      const result: PaginatedResult<FileShare> = { items, hasMore };

      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = lastItem.createdAt.toISOString();
      }

      return result;
    },

    /**
     * Take one download slot (consume_share_download)
     */
    async consumeDownload(
      id: string,
      now: Date
    ): Promise<ConsumeResult | null> {
      const { data, error } = await supabase.rpc('consume_share_download', {
        p_share_id: id,
        p_now: now.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to consume download: ${error.message}`);
      }

      const share = parseRows(data)[0];
      if (share === undefined) {
        return null;
      }

      return {
        share,
        exhausted:
          share.maxDownloads !== null &&
          share.downloadCount >= share.maxDownloads,
      };
    },

    /**
     * Delete a descriptor; deleting a missing row is not an error
     */
    async deleteShare(id: string): Promise<void> {
      const { error } = await supabase.from(TABLE).delete().eq('id', id);

      if (error !== null) {
        throw new Error(`Failed to delete share: ${error.message}`);
      }
    },

    /**
     * Delete only while expired or exhausted (delete_share_if_reclaimable)
     */
    async deleteShareIfReclaimable(id: string, now: Date): Promise<boolean> {
      const { data, error } = await supabase.rpc(
        'delete_share_if_reclaimable',
        {
          p_share_id: id,
          p_now: now.toISOString(),
        }
      );

      if (error !== null) {
        throw new Error(`Failed to reclaim share: ${error.message}`);
      }

      return z.boolean().parse(data);
    },

    /**
     * Shares due for cleanup: expired, or at their download ceiling
     */
    async listExpiredOrExhausted(
      now: Date,
      limit: number
    ): Promise<FileShare[]> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('*')
        .or(`expires_at.lte."${now.toISOString()}",is_exhausted.eq.true`)
        .order('expires_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list reclaimable shares: ${error.message}`);
      }

      return parseRows(data);
    },
  };
}
