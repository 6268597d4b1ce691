/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ShareAccessService } from '../services/share-access.service.js';
import type { ShareService } from '../services/share.service.js';
import type { UploadProgressTracker } from '../services/upload-progress.js';
import type { ActorContext, ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Services injected into the API layer
 */
export interface ApiServices {
  shareService: ShareService;
  accessService: ShareAccessService;
  progress: UploadProgressTracker;
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 410 | 413 | 429 | 500;

/**
 * Error code to HTTP status mapping
 * EXPIRED and EXHAUSTED share 410 Gone; the code tells them apart.
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  EXPIRED: 410,
  EXHAUSTED: 410,
  QUOTA_EXCEEDED: 413,
  RATE_LIMITED: 429,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
