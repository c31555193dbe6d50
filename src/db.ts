/**
 * Supabase client construction.
 * Server-side only: uses the service role key and keeps no session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigurationError } from './errors.js';

export function getSupabaseClient(
  url: string | undefined,
  serviceRoleKey: string | undefined
): SupabaseClient {
  if (!url || !serviceRoleKey) {
    throw new ConfigurationError(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
