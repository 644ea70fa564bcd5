import { z } from 'zod';
import { DEFAULT_DB_NAME, DEFAULT_SESSION_CAP, DEFAULT_SYNC_ATTEMPTS, DEFAULT_TIMEOUT_MS } from '@vocab-drill/engine';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATA_DIR: z.string().min(1).default('./data'),
  DATA_API_URL: z.string().url().optional(),
  DATA_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  SYNC_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_SYNC_ATTEMPTS),
  SESSION_CAP: z.coerce.number().int().positive().default(DEFAULT_SESSION_CAP),
  DB_NAME: z.string().min(1).default(DEFAULT_DB_NAME),
});

export type Config = z.infer<typeof ConfigSchema>;

// Empty strings count as unset, so `DATA_API_URL=` disables the data API
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Read configuration from the environment. Throws on invalid values so the
 * server fails at startup rather than on first use.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(dropEmpty(env));
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}
