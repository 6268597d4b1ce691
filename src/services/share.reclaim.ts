/**
 * Share Reclamation
 *
 * The one place a share is destroyed. Called from the last download, from the
 * cleanup sweep and from owner deletion, so all three remove things in the same
 * order: blob first, then descriptor. A crash in between leaves a descriptor
 * without a blob, which the next sweep finds again. The reverse would leave a
 * blob nothing points to.
 */

import type { FileShare } from '../types/index.js';

import type { ShareDb, ShareStorage } from './share.service.js';

export interface ReclaimDeps {
  db: Pick<ShareDb, 'deleteShare' | 'deleteShareIfReclaimable'>;
  storage: Pick<ShareStorage, 'delete'>;
}

export interface ReclaimOptions {
  /**
   * When set, the descriptor is only deleted if it is still expired or
   * exhausted at this instant (conditional delete in the database).
   */
  now?: Date;
}

/**
 * Delete blob then descriptor.
 * Returns false when the descriptor was already gone or no longer qualified.
 */
export async function reclaimShare(
  deps: ReclaimDeps,
  share: FileShare,
  options: ReclaimOptions = {}
): Promise<boolean> {
  await deps.storage.delete(share.storageKey);

  if (options.now !== undefined) {
    return deps.db.deleteShareIfReclaimable(share.id, options.now);
  }

  await deps.db.deleteShare(share.id);
  return true;
}
