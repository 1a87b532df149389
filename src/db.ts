/**
 * Supabase client factory.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(
  config: Pick<AppConfig, 'supabaseUrl' | 'supabaseServiceRoleKey'>
): SupabaseClient {
  if (client) return client;

  client = createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
