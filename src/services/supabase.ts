import { createClient, SupabaseClient } from '@supabase/supabase-js';

import { env } from '../config/env.js';
import { BILLING_ERROR_CODES, BillingError } from '../utils/errors.js';

let client: SupabaseClient | null = null;

/**
 * Shared service-role client, created on first use so that tools which never
 * touch storage work without Supabase credentials.
 */
export function getSupabase(): SupabaseClient {
  if (!client) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new BillingError(BILLING_ERROR_CODES.STORAGE_ERROR, {
        technicalMessage: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set',
      });
    }
    client = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }
  return client;
}
