import type { AccessLevel, UserGroup } from '@stratum/types';

// Database Constants
export const TABLES = {
  PII_ACCESS_GRANTS: 'pii_access_grants',
  CUSTOMERS_SILVER: 'customers_silver',
} as const;

export const RPC = {
  APPLY_SCD2_DELTA: 'apply_scd2_delta',
} as const;

// Columns written by the cleansing stage
export const QUALITY_COLUMNS = {
  FLAGS: 'data_quality_flags',
  SCORE: 'quality_score',
  PROCESSED_TS: 'silver_processed_ts',
} as const;

// Provenance columns delivered with every raw record
export const PROVENANCE_COLUMNS = ['ingested_file', 'ingestion_ts'] as const;

// Columns owned by the SCD2 engine
export const VERSION_COLUMNS = ['business_key', 'valid_from', 'valid_to', 'end_reason'] as const;

export const DEFAULT_NULL_SENTINEL = 'None';
export const QUALITY_FLAG_SEPARATOR = ', ';
export const VALIDATION_COLUMN_PREFIX = 'is_valid_';

export const DEFAULT_ACCESS_LEVEL: AccessLevel = 'masked_only';

// Initial grants per user group, seeded before the approval workflow takes over
export const DEFAULT_GROUP_ACCESS: Record<UserGroup, AccessLevel> = {
  analyst: 'masked_only',
  manager: 'masked_only',
  engineer: 'masked_only',
  scientist: 'partial_access',
  governance_officer: 'full_access',
} as const;
