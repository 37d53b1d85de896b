/**
 * Shared Supabase Client
 *
 * One service-role client per process, reused across requests.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let supabaseClient: SupabaseClient | null = null;

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  if (!supabaseClient) {
    supabaseClient = createClient(url, serviceRoleKey, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
      },
      db: {
        schema: "public",
      },
      global: {
        headers: {
          "x-client-info": "translation-ledger",
        },
      },
    });
  }

  return supabaseClient;
}
