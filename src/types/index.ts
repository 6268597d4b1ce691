/**
 * Core type definitions
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure } from './result.js';
export type { ActorContext, Principal } from './auth.js';
export type {
  FileShare,
  ShareState,
  CreateShareParams,
  UploadShareParams,
  ShareResult,
  ConsumeResult,
  BlobHandle,
  ShareDownload,
  SharePolicy,
  CleanupSummary,
  ListSharesParams,
  PaginatedResult,
} from './share.js';
export {
  getShareState,
  isReclaimable,
  normalizeListParams,
  DEFAULT_SHARE_POLICY,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
} from './share.js';
