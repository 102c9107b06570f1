/**
 * Environment configuration
 *
 * Validated once at startup with zod. Import `env` instead of reading
 * `process.env` directly.
 */

// dotenv must run before anything reads process.env
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
  // ----------------------------------------
  // SUPABASE (required by the storage client, not by pure calculation tools)
  // ----------------------------------------

  /** Project URL, e.g. https://<project>.supabase.co */
  SUPABASE_URL: z.string().url().optional(),

  /** Service role key; bypasses row level security, keep server-side */
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

  // ----------------------------------------
  // SERVER
  // ----------------------------------------

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Serve over HTTP instead of stdio */
  MCP_HTTP_MODE: z.enum(['true', 'false']).default('false'),

  PORT: z.coerce.number().int().positive().default(3000),

  /** Comma-separated list, or * */
  ALLOWED_ORIGINS: z.string().default('*'),

  /** Tool calls per user per minute in HTTP mode */
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${issues}`);
  }
  return result.data;
}

export const env = parseEnv();

export function allowedOrigins(config: Pick<Env, 'ALLOWED_ORIGINS'> = env): string[] {
  return config.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}
