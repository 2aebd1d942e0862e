import { describe, it, expect } from '@jest/globals';
import type { AccessGrant } from '@stratum/types';
import { GrantStoreError } from '@stratum/shared';
import { FakeSupabase } from '../../__tests__/fakeSupabase';
import { defaultGroupGrants } from '../effectiveGrant';
import { SupabaseAccessGrantStore } from '../SupabaseAccessGrantStore';

const USER = 'scientist@example.com';
const AT = new Date('2024-02-01T00:00:00Z');

const row = {
  user_email: USER,
  user_group: 'scientist',
  access_level: 'partial_access',
  granted_by: 'governance@example.com',
  granted_at: '2024-01-01T00:00:00+00:00',
  expires_at: null,
  is_active: true,
  reason: 'Model training',
  approval_ticket_id: 'GOV-1',
};

describe('SupabaseAccessGrantStore', () => {
  it('should query the latest active, unexpired grant', async () => {
    const supabase = new FakeSupabase([{ data: row, error: null }]);
    const store = new SupabaseAccessGrantStore(supabase.asClient());

    const grant = await store.effectiveGrant(USER, AT);

    expect(supabase.queries[0].table).toBe('pii_access_grants');
    expect(supabase.lastQuery().calls).toEqual([
      ['select', '*'],
      ['eq', 'user_email', USER],
      ['eq', 'is_active', true],
      ['or', 'expires_at.is.null,expires_at.gt.2024-02-01T00:00:00.000Z'],
      ['lte', 'granted_at', '2024-02-01T00:00:00.000Z'],
      ['order', 'granted_at', { ascending: false }],
      ['limit', 1],
      ['maybeSingle'],
    ]);
    expect(grant).toEqual({
      user_id: USER,
      user_group: 'scientist',
      access_level: 'partial_access',
      granted_by: 'governance@example.com',
      granted_at: new Date('2024-01-01T00:00:00Z'),
      expires_at: null,
      is_active: true,
      reason: 'Model training',
      approval_ticket_id: 'GOV-1',
    });
  });

  it('should return null when no grant matches', async () => {
    const store = new SupabaseAccessGrantStore(new FakeSupabase([{ data: null, error: null }]).asClient());

    expect(await store.effectiveGrant(USER, AT)).toBeNull();
  });

  it('should use the configured table', async () => {
    const supabase = new FakeSupabase([{ data: null, error: null }]);
    await new SupabaseAccessGrantStore(supabase.asClient(), 'grants_v2').effectiveGrant(USER, AT);

    expect(supabase.queries[0].table).toBe('grants_v2');
  });

  it('should raise a grant store error when the query fails', async () => {
    const supabase = new FakeSupabase([{ data: null, error: { message: 'permission denied' } }]);
    const store = new SupabaseAccessGrantStore(supabase.asClient());

    await expect(store.effectiveGrant(USER, AT)).rejects.toThrow(
      `Failed to load grants for ${USER}: permission denied`
    );
  });

  it('should reject rows with an unknown access level', async () => {
    const supabase = new FakeSupabase([{ data: { ...row, access_level: 'everything' }, error: null }]);
    const store = new SupabaseAccessGrantStore(supabase.asClient());

    await expect(store.effectiveGrant(USER, AT)).rejects.toThrow(GrantStoreError);
  });

  it('should upsert grants keyed by user and group', async () => {
    const supabase = new FakeSupabase();
    const store = new SupabaseAccessGrantStore(supabase.asClient());
    const grant: AccessGrant = {
      user_id: USER,
      user_group: 'scientist',
      access_level: 'partial_access',
      granted_by: 'system',
      granted_at: new Date('2024-01-01T00:00:00Z'),
      expires_at: null,
      is_active: true,
      reason: null,
      approval_ticket_id: null,
    };

    await store.upsertGrants([grant]);
    await store.upsertGrants([]);

    expect(supabase.queries).toHaveLength(1);
    expect(supabase.lastQuery().calls).toEqual([
      [
        'upsert',
        [
          {
            user_email: USER,
            user_group: 'scientist',
            access_level: 'partial_access',
            granted_by: 'system',
            granted_at: '2024-01-01T00:00:00.000Z',
            expires_at: null,
            is_active: true,
            reason: null,
            approval_ticket_id: null,
          },
        ],
        { onConflict: 'user_email,user_group' },
      ],
    ]);
  });

  it('should seed default group grants', async () => {
    const supabase = new FakeSupabase();
    const store = new SupabaseAccessGrantStore(supabase.asClient());

    await store.upsertGrants(
      defaultGroupGrants([{ userId: 'officer@example.com', group: 'governance_officer' }], 'system', AT)
    );

    expect(supabase.lastQuery().calls[0][1]).toEqual([
      {
        user_email: 'officer@example.com',
        user_group: 'governance_officer',
        access_level: 'full_access',
        granted_by: 'system',
        granted_at: '2024-02-01T00:00:00.000Z',
        expires_at: null,
        is_active: true,
        reason: 'Default access for group governance_officer',
        approval_ticket_id: null,
      },
    ]);
  });
});
