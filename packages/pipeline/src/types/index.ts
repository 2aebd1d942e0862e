import type { CleansedRecord, HistoryDelta, MaskingPolicy } from '@stratum/types';
import type { MalformedRecordError, MergeIntegrityError, QualitySummary } from '@stratum/shared';
import type { TableConfig } from '../config/TableConfig';
import type { ScdConfig } from '../config/ScdConfig';

// Cleansing
export interface CleansingResult {
  records: CleansedRecord[];
  summary: QualitySummary;
}

// SCD2 merge
export interface MergeMetrics {
  inputRecords: number;
  rejectedRecords: number;
  collapsedRecords: number;
  staleRecords: number;
  noopRecords: number;
  noopDeletes: number;
  skippedRecords: number;
  insertedVersions: number;
  closedVersions: number;
  deletedKeys: number;
  corruptKeys: number;
  integrityViolations: number;
}

export interface MergeResult {
  table: string;
  delta: HistoryDelta;
  metrics: MergeMetrics;
  rejected: MalformedRecordError[];
  integrityErrors: MergeIntegrityError[];
}

// Table definitions
export interface TableDefinition {
  name: string;
  cleansing: TableConfig;
  scd: ScdConfig;
  masking?: MaskingPolicy;
}

// Orchestration
export interface PipelineRunOptions {
  runId?: string;
  signal?: AbortSignal;
}

export interface PipelineRunResult {
  runId: string;
  table: string;
  attempts: number;
  quality: QualitySummary;
  merge: MergeResult;
}

export interface BatchEvent {
  runId: string;
  table: string;
}

export interface BatchStartedEvent extends BatchEvent {
  records: number;
}

export interface BatchCommittedEvent extends BatchEvent {
  attempts: number;
  inserted: number;
  closed: number;
}

export interface BatchFailedEvent extends BatchEvent {
  error: Error;
}
