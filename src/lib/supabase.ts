/**
 * Supabase Client Configuration
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Server-side only: the share tables are never exposed to browsers
 */
export function createSupabaseAdmin(
  url: string,
  serviceKey: string
): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
