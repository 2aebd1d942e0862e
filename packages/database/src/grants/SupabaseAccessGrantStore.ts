import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { AccessGrant, AccessGrantStore } from '@stratum/types';
import { GrantStoreError, TABLES, createLogger } from '@stratum/shared';

// Row shape of the grant table; users are identified by email there
export const GrantRowSchema = z.object({
  user_email: z.string().min(1),
  user_group: z.string().min(1),
  access_level: z.enum(['full_access', 'partial_access', 'masked_only']),
  granted_by: z.string(),
  granted_at: z.coerce.date(),
  expires_at: z.coerce.date().nullable().default(null),
  is_active: z.boolean(),
  reason: z.string().nullable().default(null),
  approval_ticket_id: z.string().nullable().default(null),
});

export type GrantRow = z.output<typeof GrantRowSchema>;

function toGrant(row: GrantRow): AccessGrant {
  return {
    user_id: row.user_email,
    user_group: row.user_group,
    access_level: row.access_level,
    granted_by: row.granted_by,
    granted_at: row.granted_at,
    expires_at: row.expires_at,
    is_active: row.is_active,
    reason: row.reason,
    approval_ticket_id: row.approval_ticket_id,
  };
}

function toRow(grant: AccessGrant): Record<string, string | boolean | null> {
  return {
    user_email: grant.user_id,
    user_group: grant.user_group,
    access_level: grant.access_level,
    granted_by: grant.granted_by,
    granted_at: grant.granted_at.toISOString(),
    expires_at: grant.expires_at ? grant.expires_at.toISOString() : null,
    is_active: grant.is_active,
    reason: grant.reason,
    approval_ticket_id: grant.approval_ticket_id,
  };
}

/**
 * Access grants read from the grant table on every lookup. Nothing is
 * cached, so a revoked grant stops applying on the next query.
 */
export class SupabaseAccessGrantStore implements AccessGrantStore {
  private readonly logger = createLogger('SupabaseAccessGrantStore');

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table: string = TABLES.PII_ACCESS_GRANTS
  ) {}

  async effectiveGrant(userId: string, at: Date): Promise<AccessGrant | null> {
    const iso = at.toISOString();

    const { data, error } = await this.supabase
      .from(this.table)
      .select('*')
      .eq('user_email', userId)
      .eq('is_active', true)
      .or(`expires_at.is.null,expires_at.gt.${iso}`)
      .lte('granted_at', iso)
      .order('granted_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw new GrantStoreError(`Failed to load grants for ${userId}: ${error.message}`, error);
    }
    if (!data) return null;

    const parsed = GrantRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new GrantStoreError(`Malformed grant row for ${userId}: ${parsed.error.message}`, parsed.error);
    }
    return toGrant(parsed.data);
  }

  /** Seeds rows such as `defaultGroupGrants`; approvals are managed elsewhere. */
  async upsertGrants(grants: readonly AccessGrant[]): Promise<void> {
    if (grants.length === 0) return;

    const { error } = await this.supabase
      .from(this.table)
      .upsert(grants.map(toRow), { onConflict: 'user_email,user_group' });

    if (error) {
      throw new GrantStoreError(`Failed to write ${grants.length} grant(s): ${error.message}`, error);
    }
    this.logger.info('Grants upserted', { table: this.table, count: grants.length });
  }
}
