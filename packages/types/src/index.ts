// Core record types
export type FieldValue = string | number | boolean | Date | null | undefined;

export type DataRecord = Record<string, FieldValue>;

// Raw (bronze) record: normalized column names plus the ingested_file and
// ingestion_ts provenance columns
export type RawRecord = DataRecord;

export interface QualityMetadata {
  data_quality_flags: string | null;
  quality_score: number;
}

export interface CleansedRecord extends DataRecord, QualityMetadata {
  silver_processed_ts: string | Date;
}

// SCD Type 2
export type SequenceValue = string | number | Date;

export type VersionEndReason = 'superseded' | 'deleted';

export interface VersionBookkeeping {
  business_key: string;
  valid_from: SequenceValue;
  valid_to: SequenceValue | null;
  end_reason: VersionEndReason | null;
}

// One version of a business entity; usually a cleansed record plus bookkeeping
export interface HistoricalRecord extends DataRecord, VersionBookkeeping {}

export interface VersionClose {
  business_key: string;
  valid_from: SequenceValue;
  valid_to: SequenceValue;
  end_reason: VersionEndReason;
}

// Value-level description of one batch's effect on a historical table
export interface HistoryDelta {
  inserts: HistoricalRecord[];
  closes: VersionClose[];
}

export interface HistoricalTableStore {
  loadHistory(table: string, businessKeys: string[]): Promise<HistoricalRecord[]>;
  commit(table: string, delta: HistoryDelta): Promise<void>;
  queryCurrent(table: string): Promise<HistoricalRecord[]>;
  queryAsOf(table: string, at: SequenceValue): Promise<HistoricalRecord[]>;
  queryHistory(table: string, businessKey: string): Promise<HistoricalRecord[]>;
}

// Access control
export type AccessLevel = 'full_access' | 'partial_access' | 'masked_only';

export type UserGroup =
  | 'analyst'
  | 'scientist'
  | 'engineer'
  | 'manager'
  | 'governance_officer';

export interface AccessGrant {
  user_id: string;
  user_group: UserGroup | string;
  access_level: AccessLevel;
  granted_by: string;
  granted_at: Date;
  expires_at: Date | null;
  is_active: boolean;
  reason: string | null;
  approval_ticket_id: string | null;
}

export interface AccessGrantStore {
  effectiveGrant(userId: string, at: Date): Promise<AccessGrant | null>;
}

// Masking policy: field -> masker name, optionally capped at a level
export interface FieldMaskingRule {
  masker: string;
  maxLevel?: AccessLevel;
}

export interface MaskingPolicy {
  table: string;
  fields: Record<string, FieldMaskingRule>;
}

// Masked (gold) projection metadata
export interface MaskingMetadata {
  masked_at: Date;
  masked_for_user: string;
  applied_access_level: AccessLevel;
}

export type MaskedRecord = DataRecord & MaskingMetadata;
