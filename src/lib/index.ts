/**
 * Shared Library Exports
 */

export { createSupabaseAdmin } from './supabase.js';
export { createUpstashRatelimit } from './redis.js';
