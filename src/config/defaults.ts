import { z } from 'zod';
import { DEFAULT_CONFIG_PATH } from './loader';
import { LOG_LEVELS, type LogLevel } from '../shared/logger';

const envSchema = z.object({
  ANTHROPIC_API_KEY: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : null)),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DIGEST_CONFIG_PATH: z.string().min(1).default(DEFAULT_CONFIG_PATH),
});

export interface EnvConfig {
  anthropic_api_key: string | null;
  log_level: LogLevel;
  config_path: string;
}

/**
 * Read the process environment. Throws listing every invalid variable.
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }

  return {
    anthropic_api_key: result.data.ANTHROPIC_API_KEY,
    log_level: result.data.LOG_LEVEL,
    config_path: result.data.DIGEST_CONFIG_PATH,
  };
}
