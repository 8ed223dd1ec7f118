/**
 * Supabase Client Configuration
 * Service-role client backing the chat and place document store
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase client with the service key.
 * Sessions are never persisted: this process has no signed-in user.
 */
export function createSupabaseAdmin(config: SupabaseConfig): SupabaseClient {
  if (config.url === '' || config.serviceKey === '') {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
  }

  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
