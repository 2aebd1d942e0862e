import type { AccessGrant, AccessGrantStore } from '@stratum/types';
import { selectEffectiveGrant } from './effectiveGrant';

function sameGrant(a: AccessGrant, b: AccessGrant): boolean {
  return a.user_id === b.user_id && a.user_group === b.user_group;
}

/**
 * Grant table held in memory. A grant is identified by user and group;
 * upserting the same pair replaces the earlier row.
 */
export class InMemoryAccessGrantStore implements AccessGrantStore {
  private grants: AccessGrant[] = [];

  constructor(seed: readonly AccessGrant[] = []) {
    for (const grant of seed) this.upsert(grant);
  }

  upsert(grant: AccessGrant): void {
    this.grants = [...this.grants.filter(existing => !sameGrant(existing, grant)), { ...grant }];
  }

  deactivate(userId: string): number {
    let count = 0;
    this.grants = this.grants.map(grant => {
      if (grant.user_id !== userId || !grant.is_active) return grant;
      count++;
      return { ...grant, is_active: false };
    });
    return count;
  }

  list(userId?: string): AccessGrant[] {
    return this.grants.filter(grant => userId === undefined || grant.user_id === userId).map(grant => ({ ...grant }));
  }

  async effectiveGrant(userId: string, at: Date): Promise<AccessGrant | null> {
    const grant = selectEffectiveGrant(this.grants, userId, at);
    return grant ? { ...grant } : null;
  }
}
