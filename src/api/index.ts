/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export type { AppConfig } from './app.js';
export { createApp } from './app.js';
export type { ApiServices } from './types.js';
export type { PrincipalResolver } from './middleware/auth.js';
export {
  createSupabasePrincipalResolver,
  createStaticPrincipalResolver,
} from './middleware/auth.js';
export {
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './middleware/rateLimit.js';
