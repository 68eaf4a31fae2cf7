/**
 * Supabase client using @supabase/supabase-js
 *
 * Only used for:
 * - Bootstrap: Load users, accounts, filters and recent bookings into memory
 * - Inserts whose generated ids the bot needs (awaited)
 * - Write-through: Persist updates (errors logged, never thrown)
 */
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { logger, errorMessage } from "../logger";

let supabase: SupabaseClient | null = null;

/**
 * Initialize the Supabase client
 */
export function initializeSupabase(url: string, key: string): SupabaseClient {
  if (supabase) return supabase;

  supabase = createClient(url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  logger.info("Supabase client initialized");
  return supabase;
}

/**
 * Close the connection (no-op for Supabase JS client, but keeps interface consistent)
 */
export async function closeSupabase(): Promise<void> {
  if (supabase) {
    supabase = null;
    logger.info("Supabase client closed");
  }
}

/**
 * Minimal shape of a Supabase query result
 */
interface QueryResult {
  error: { message: string } | null;
}

/**
 * Execute a write with error logging (for write-through operations).
 * Errors are logged but not thrown.
 */
export async function executeWriteThrough(
  operation: string,
  query: () => PromiseLike<QueryResult>
): Promise<boolean> {
  try {
    const { error } = await query();
    if (error) {
      logger.error({ operation, error: error.message }, "Write-through failed");
      return false;
    }
    return true;
  } catch (error) {
    logger.error({ operation, error: errorMessage(error) }, "Write-through failed");
    return false;
  }
}
