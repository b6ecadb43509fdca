import { createClient, type SupabaseClient } from '@supabase/supabase-js';

// No browser session here: the anon key (or a service key) is used as is.
export function createSupabase(url: string, anonKey: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}
