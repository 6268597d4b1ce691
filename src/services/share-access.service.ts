/**
 * ShareAccessService Implementation
 *
 * SCOPE: Resolving a share token to a byte stream
 * The token is the only credential; no actor is required.
 *
 * Slot policy: a download takes its slot when it starts, before any byte is
 * sent but after the file is open, so a sweep that follows can only unlink a
 * file already being read. consumeDownload is the single serialisation point,
 * so when one slot remains exactly one concurrent caller gets it. A download
 * the client aborts halfway has still used its slot.
 */

import type {
  BlobHandle,
  ConsumeResult,
  ErrorCode,
  FileShare,
  Result,
  ShareDownload,
  ShareState,
} from '../types/index.js';
import { failure, getShareState, success } from '../types/index.js';

import { isStorageError } from './share.errors.js';
import { reclaimShare } from './share.reclaim.js';
import type { ShareDb, ShareStorage } from './share.service.js';
import { isWellFormedToken } from './share-token.js';

/**
 * ShareAccessService interface
 */
export interface ShareAccessService {
  download(token: string): Promise<Result<ShareDownload>>;
}

type DenialCode = Extract<ErrorCode, 'NOT_FOUND' | 'EXPIRED' | 'EXHAUSTED'>;

/**
 * Fixed messages: a denial says nothing beyond its own code
 */
const DENIAL_MESSAGES: Record<DenialCode, string> = {
  NOT_FOUND: 'Share not found',
  EXPIRED: 'This share has expired',
  EXHAUSTED: 'This share has reached its download limit',
};

function deny(code: DenialCode) {
  return failure(code, DENIAL_MESSAGES[code]);
}

function denialForState(state: Exclude<ShareState, 'active'>) {
  return deny(state === 'expired' ? 'EXPIRED' : 'EXHAUSTED');
}

/**
 * Create ShareAccessService instance
 */
export function createShareAccessService(deps: {
  db: ShareDb;
  storage: ShareStorage;
  now?: () => Date;
}): ShareAccessService {
  const { db, storage } = deps;
  const now = deps.now ?? (() => new Date());

  /**
   * Why no slot was available, judged from the descriptor we read
   */
  function denialAfterLostSlot(share: FileShare) {
    return share.expiresAt.getTime() <= now().getTime()
      ? deny('EXPIRED')
      : deny('EXHAUSTED');
  }

  /**
   * The blob was gone before we opened it: a sweep or the owner got there
   * first, unless the descriptor is still live
   */
  async function denialForMissingBlob(share: FileShare) {
    const current = await db.getShareById(share.id);
    if (current === null) {
      const state = getShareState(share, now());
      return state === 'active' ? deny('NOT_FOUND') : denialForState(state);
    }
    const state = getShareState(current, now());
    if (state !== 'active') {
      return denialForState(state);
    }
    console.error(
      `Blob missing for live share ${share.id} (key ${share.storageKey})`
    );
    return failure('INTERNAL_ERROR', 'Stored file is missing');
  }

  return {
    async download(token: string): Promise<Result<ShareDownload>> {
      if (!isWellFormedToken(token)) {
        return deny('NOT_FOUND');
      }

      try {
        const share = await db.getShareByToken(token);
        if (share === null) {
          return deny('NOT_FOUND');
        }

        const state = getShareState(share, now());
        if (state !== 'active') {
          return denialForState(state);
        }

        // Open before taking the slot: a sweep that runs after this point
        // unlinks a file we already hold
        let blob: BlobHandle;
        try {
          blob = await storage.get(share.storageKey);
        } catch (error) {
          if (!isStorageError(error, 'NOT_FOUND')) {
            throw error;
          }
          return await denialForMissingBlob(share);
        }

        let consumed: ConsumeResult | null;
        try {
          consumed = await db.consumeDownload(share.id, now());
        } catch (error) {
          blob.stream.destroy();
          throw error;
        }
        if (consumed === null) {
          blob.stream.destroy();
          return denialAfterLostSlot(share);
        }

        if (consumed.exhausted) {
          // The open handle keeps streaming after the blob is unlinked
          try {
            await reclaimShare({ db, storage }, consumed.share, {
              now: now(),
            });
          } catch (error) {
            // Exhausted shares are unreachable; the next sweep retries
            console.error(
              `Failed to reclaim exhausted share ${share.id}:`,
              error
            );
          }
        }

        return success({
          share: consumed.share,
          stream: blob.stream,
          sizeBytes: blob.sizeBytes,
        });
      } catch (error) {
        console.error('Download failed:', error);
        return failure('INTERNAL_ERROR', 'Failed to serve file');
      }
    },
  };
}
