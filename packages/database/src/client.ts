// Supabase client configuration for the pipeline's service processes

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import { ConfigurationError, TABLES, createLogger, loadEnvConfig } from '@stratum/shared';
import type { EnvConfig } from '@stratum/shared';
import { SupabaseAccessGrantStore } from './grants/SupabaseAccessGrantStore';
import { SupabaseHistoricalStore } from './history/SupabaseHistoricalStore';

const logger = createLogger('supabase');

// Service-role client; grant and history tables are not exposed through RLS
export function createSupabaseClient(env: EnvConfig = loadEnvConfig()): SupabaseClient {
  if (!env.SUPABASE_URL) {
    throw new ConfigurationError('Missing env var: SUPABASE_URL');
  }
  if (!env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new ConfigurationError('Missing env var: SUPABASE_SERVICE_ROLE_KEY');
  }

  return createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': 'stratum-pipeline',
      },
    },
  });
}

export interface SupabaseStores {
  client: SupabaseClient;
  grants: SupabaseAccessGrantStore;
  history: SupabaseHistoricalStore;
}

export function createSupabaseStores(env: EnvConfig = loadEnvConfig()): SupabaseStores {
  const client = createSupabaseClient(env);
  return {
    client,
    grants: new SupabaseAccessGrantStore(client, env.STRATUM_GRANTS_TABLE),
    history: new SupabaseHistoricalStore(client),
  };
}

// Connection health check
export async function checkConnection(
  client: SupabaseClient,
  table: string = TABLES.PII_ACCESS_GRANTS
): Promise<boolean> {
  const { error } = await client.from(table).select('*', { count: 'exact', head: true }).limit(1);

  if (error) {
    logger.error('Database connection error', { table, error: error.message });
    return false;
  }
  return true;
}
