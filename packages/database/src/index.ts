// Database package exports: Supabase-backed stores, access grants and masked projections

export { createSupabaseClient, createSupabaseStores, checkConnection } from './client';
export type { SupabaseStores } from './client';

// Access grants
export { selectEffectiveGrant, isGrantEffective, defaultGroupGrants } from './grants/effectiveGrant';
export type { GroupMember } from './grants/effectiveGrant';
export { InMemoryAccessGrantStore } from './grants/InMemoryAccessGrantStore';
export { SupabaseAccessGrantStore, GrantRowSchema } from './grants/SupabaseAccessGrantStore';
export type { GrantRow } from './grants/SupabaseAccessGrantStore';
export { resolveAccessLevel } from './grants/resolveAccessLevel';
export type { ResolveAccessOptions } from './grants/resolveAccessLevel';

// Masking
export { maskRecord } from './masking/maskRecord';
export { MaskingEvaluator } from './masking/MaskingEvaluator';
export type { MaskingEvaluatorOptions } from './masking/MaskingEvaluator';
export {
  CUSTOMER_MASKING_POLICY,
  TABLE_MASKING_POLICIES,
  getMaskingPolicy,
  assertMaskingPolicy,
} from './masking/policies';

// Historical tables
export { SupabaseHistoricalStore, HistoricalRowSchema } from './history/SupabaseHistoricalStore';
