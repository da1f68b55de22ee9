/**
 * Service Role Supabase Client
 *
 * Intake services run server-side on behalf of guest applicants, so they
 * read and write accounts with the service role. The key must never reach
 * browser code.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase client with service_role privileges.
 *
 * @throws Error if SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is missing.
 */
export function getServiceSupabase(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key) {
    throw new Error(
      'Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY. ' +
      'Intake services cannot read accounts without service_role access.'
    );
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
