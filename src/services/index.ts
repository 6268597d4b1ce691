/**
 * Service Layer Exports
 *
 * Services are the only gateway to descriptors and blobs.
 */

// ShareService - upload and owner operations
export type { ShareService, ShareDb, ShareStorage } from './share.service.js';
export { createShareService, MAX_TOKEN_ATTEMPTS } from './share.service.js';
export { createShareDb } from './share.db.js';
export {
  createLocalShareStorage,
  sanitizeFilename,
  buildStorageKey,
} from './share.storage.js';

// ShareAccessService - token-gated downloads
export type { ShareAccessService } from './share-access.service.js';
export { createShareAccessService } from './share-access.service.js';

// Shared pieces
export { reclaimShare } from './share.reclaim.js';
export type { TokenIssuer } from './share-token.js';
export { createTokenIssuer, isWellFormedToken } from './share-token.js';
export type {
  UploadProgress,
  UploadProgressTracker,
} from './upload-progress.js';
export {
  createUploadProgressTracker,
  getProgressPercent,
} from './upload-progress.js';
export {
  StorageError,
  ShareConflictError,
  isStorageError,
} from './share.errors.js';
