/**
 * Runtime settings
 * Reads the process environment (after .env is loaded) and validates it once at startup
 */

import 'dotenv/config';
import { z } from 'zod';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const SettingsSchema = z.object({
  PORT: intFromEnv(3001, 1, 65535),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Default LLM credentials, used when the acting user has none configured
  LLM_API_KEY: z.string().default(''),
  LLM_BASE_URL: z.string().default('https://api.openai.com'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_MAX_ATTEMPTS: intFromEnv(3, 1, 10),
  LLM_BACKOFF_STEP_MS: intFromEnv(1500, 0, 60000),
  LLM_TIMEOUT_MS: intFromEnv(600000, 1000, 3600000),

  SCHEDULE_SLACK: intFromEnv(6, 0, 50),
  LONG_POLL_MAX_SECONDS: intFromEnv(25, 1, 120),
  TIME_REPAIR_ATTEMPTS: intFromEnv(2, 0, 10),

  // Optional external merge step for copyright packages; empty means in-process merge
  MERGE_COMMAND: z.string().default('')
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse settings from an env-like record, throwing a readable error listing every bad key
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export const SETTINGS: Settings = loadSettings();
