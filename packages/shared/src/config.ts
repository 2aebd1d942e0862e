import { z } from 'zod';
import { TABLES } from './constants';
import { ConfigurationError } from './errors';

// Environment configuration schema
const EnvConfigSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  NODE_ENV: z.string().default('development'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  STRATUM_GRANTS_TABLE: z.string().min(1).default(TABLES.PII_ACCESS_GRANTS),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`, parsed.error);
  }
  return parsed.data;
}
