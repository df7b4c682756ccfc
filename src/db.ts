/**
 * Supabase client factory.
 * Uses the service role key: the pipeline runs server-side only.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigError } from './errors.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(env: Record<string, string | undefined> = process.env): SupabaseClient {
  if (client) return client;

  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must both be set');
  }

  client = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
