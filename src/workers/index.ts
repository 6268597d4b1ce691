/**
 * Background Workers Exports
 */

export type { ShareCleanupWorker } from './share-cleanup.worker.js';
export {
  createShareCleanupWorker,
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_CLEANUP_BATCH_SIZE,
  DEFAULT_STAGING_MAX_AGE_MS,
} from './share-cleanup.worker.js';
