import type { AccessGrant, UserGroup } from '@stratum/types';
import { DEFAULT_GROUP_ACCESS } from '@stratum/shared';

export function isGrantEffective(grant: AccessGrant, at: Date): boolean {
  if (!grant.is_active) return false;
  if (grant.granted_at.getTime() > at.getTime()) return false;
  return grant.expires_at === null || grant.expires_at.getTime() > at.getTime();
}

/**
 * The grant that decides a user's access at `at`: active, already granted,
 * not yet expired. When several qualify, the most recently granted wins.
 */
export function selectEffectiveGrant(
  grants: readonly AccessGrant[],
  userId: string,
  at: Date
): AccessGrant | null {
  let selected: AccessGrant | null = null;

  for (const grant of grants) {
    if (grant.user_id !== userId || !isGrantEffective(grant, at)) continue;
    if (selected === null || grant.granted_at.getTime() > selected.granted_at.getTime()) {
      selected = grant;
    }
  }

  return selected;
}

export interface GroupMember {
  userId: string;
  group: UserGroup;
}

// Seed grants for group members before individual approvals exist
export function defaultGroupGrants(
  members: readonly GroupMember[],
  grantedBy: string,
  grantedAt: Date
): AccessGrant[] {
  return members.map(member => ({
    user_id: member.userId,
    user_group: member.group,
    access_level: DEFAULT_GROUP_ACCESS[member.group],
    granted_by: grantedBy,
    granted_at: grantedAt,
    expires_at: null,
    is_active: true,
    reason: `Default access for group ${member.group}`,
    approval_ticket_id: null,
  }));
}
