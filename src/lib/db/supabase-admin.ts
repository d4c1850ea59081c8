import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ensureEnvLoaded, requireEnv } from "@/lib/config";

export type SupabaseTarget = "local" | "prod";

const clientCache = new Map<SupabaseTarget, SupabaseClient>();

/**
 * Returns a cached service-role client for the given target.
 *
 * - "local" → local Supabase instance (`supabase start`)
 * - "prod" → hosted archive project
 */
export function getSupabaseAdminClient(target: SupabaseTarget = "local"): SupabaseClient {
  const cached = clientCache.get(target);
  if (cached) {
    return cached;
  }

  ensureEnvLoaded();

  let url: string;
  let serviceRoleKey: string;

  if (target === "local") {
    url = process.env.SUPABASE_LOCAL_URL ?? process.env.SUPABASE_URL ?? requireEnv("SUPABASE_LOCAL_URL");
    serviceRoleKey =
      process.env.SUPABASE_LOCAL_SERVICE_ROLE_KEY ??
      process.env.SUPABASE_SERVICE_ROLE_KEY ??
      requireEnv("SUPABASE_LOCAL_SERVICE_ROLE_KEY");
  } else {
    url = process.env.SUPABASE_PROD_URL ?? process.env.SUPABASE_URL ?? requireEnv("SUPABASE_PROD_URL");
    serviceRoleKey =
      process.env.SUPABASE_PROD_SERVICE_ROLE_KEY ??
      process.env.SUPABASE_SERVICE_ROLE_KEY ??
      requireEnv("SUPABASE_PROD_SERVICE_ROLE_KEY");
  }

  const client = createClient(url, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });

  clientCache.set(target, client);
  return client;
}
