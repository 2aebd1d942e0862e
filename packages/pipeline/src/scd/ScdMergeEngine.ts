import type {
  DataRecord,
  HistoricalRecord,
  SequenceValue,
  VersionClose,
  VersionEndReason,
} from '@stratum/types';
import {
  MalformedRecordError,
  MergeIntegrityError,
  VERSION_COLUMNS,
  createLogger,
  getErrorMessage,
} from '@stratum/shared';
import { parseScdConfig } from '../config/ScdConfig';
import type { ScdConfig, ScdConfigInput } from '../config/ScdConfig';
import type { MergeMetrics, MergeResult } from '../types';
import { compareVersions, verifyVersionChain } from './integrity';
import { businessKeyOf, readSequence, sequenceOrdinal, valuesEqual } from './sequence';

const BOOKKEEPING_COLUMNS: readonly string[] = VERSION_COLUMNS;

interface KeyedRecord {
  index: number;
  record: DataRecord;
  businessKey: string;
  sequence: SequenceValue;
  ordinal: number;
  isDelete: boolean;
}

interface WorkingVersion {
  record: HistoricalRecord;
  existing: boolean;
  originallyOpen: boolean;
}

interface KeyOutcome {
  chain: HistoricalRecord[];
  inserts: HistoricalRecord[];
  closes: VersionClose[];
  deleted: boolean;
}

function emptyMetrics(inputRecords: number): MergeMetrics {
  return {
    inputRecords,
    rejectedRecords: 0,
    collapsedRecords: 0,
    staleRecords: 0,
    noopRecords: 0,
    noopDeletes: 0,
    skippedRecords: 0,
    insertedVersions: 0,
    closedVersions: 0,
    deletedKeys: 0,
    corruptKeys: 0,
    integrityViolations: 0,
  };
}

/**
 * SCD Type 2 merge planner
 *
 * Computes the versions a batch adds to a historical table and the open
 * versions it closes. Pure: the existing history is read, never modified,
 * and nothing is written. Keys are independent; a key whose existing or
 * resulting chain is inconsistent contributes nothing to the delta.
 */
export class ScdMergeEngine {
  private readonly config: ScdConfig;
  private readonly logger = createLogger('ScdMergeEngine');

  constructor(config: ScdConfig | ScdConfigInput) {
    this.config = parseScdConfig(config);
  }

  get table(): string {
    return this.config.table;
  }

  get keys(): readonly string[] {
    return this.config.keys;
  }

  businessKeyOf(record: DataRecord): string | null {
    return businessKeyOf(this.config.keys, record);
  }

  merge(batch: readonly DataRecord[], existingHistory: readonly HistoricalRecord[]): MergeResult {
    const metrics = emptyMetrics(batch.length);
    const rejected: MalformedRecordError[] = [];
    const integrityErrors: MergeIntegrityError[] = [];

    const incomingByKey = new Map<string, KeyedRecord[]>();
    batch.forEach((record, index) => {
      const keyed = this.prepare(record, index);
      if (keyed instanceof MalformedRecordError) {
        rejected.push(keyed);
        return;
      }
      const group = incomingByKey.get(keyed.businessKey);
      if (group) {
        group.push(keyed);
      } else {
        incomingByKey.set(keyed.businessKey, [keyed]);
      }
    });
    metrics.rejectedRecords = rejected.length;

    if (rejected.length > 0) {
      this.logger.warn('Rejected malformed records', {
        table: this.config.table,
        count: rejected.length,
        indexes: rejected.map(error => error.index),
      });
    }

    const historyByKey = new Map<string, HistoricalRecord[]>();
    for (const version of existingHistory) {
      const chain = historyByKey.get(version.business_key);
      if (chain) {
        chain.push(version);
      } else {
        historyByKey.set(version.business_key, [version]);
      }
    }

    const inserts: HistoricalRecord[] = [];
    const closes: VersionClose[] = [];

    for (const [businessKey, records] of incomingByKey) {
      const existing = historyByKey.get(businessKey) ?? [];

      const existingProblems = verifyVersionChain(existing);
      if (existingProblems.length > 0) {
        metrics.corruptKeys++;
        metrics.skippedRecords += records.length;
        integrityErrors.push(
          new MergeIntegrityError(
            `Existing history for key ${businessKey} is inconsistent: ${existingProblems.join('; ')}`,
            businessKey
          )
        );
        continue;
      }

      const outcome = this.applyToChain(businessKey, existing, this.collapseTies(records, metrics), metrics);

      const problems = verifyVersionChain(outcome.chain);
      if (problems.length > 0) {
        metrics.integrityViolations++;
        metrics.skippedRecords += records.length;
        integrityErrors.push(
          new MergeIntegrityError(
            `Merge would leave key ${businessKey} inconsistent: ${problems.join('; ')}`,
            businessKey
          )
        );
        continue;
      }

      inserts.push(...outcome.inserts);
      closes.push(...outcome.closes);
      if (outcome.deleted) metrics.deletedKeys++;
    }

    metrics.insertedVersions = inserts.length;
    metrics.closedVersions = closes.length;

    if (integrityErrors.length > 0) {
      this.logger.error('History integrity violations', {
        table: this.config.table,
        keys: integrityErrors.map(error => error.businessKey),
      });
    }

    this.logger.debug('SCD2 merge planned', { table: this.config.table, ...metrics });

    return {
      table: this.config.table,
      delta: { inserts, closes },
      metrics,
      rejected,
      integrityErrors,
    };
  }

  private prepare(record: DataRecord, index: number): KeyedRecord | MalformedRecordError {
    const ingestedFile = typeof record.ingested_file === 'string' ? record.ingested_file : null;

    const businessKey = businessKeyOf(this.config.keys, record);
    if (businessKey === null) {
      return new MalformedRecordError(
        `Record ${index} is missing business key column(s): ${this.config.keys.join(', ')}`,
        index,
        null,
        ingestedFile
      );
    }

    const sequence = readSequence(record[this.config.sequenceBy]);
    if (sequence === null) {
      return new MalformedRecordError(
        `Record ${index} has no usable '${this.config.sequenceBy}' value`,
        index,
        businessKey,
        ingestedFile
      );
    }

    let isDelete: boolean;
    try {
      isDelete = this.isDeleteRecord(record);
    } catch (error) {
      return new MalformedRecordError(
        `Delete check failed for record ${index}: ${getErrorMessage(error)}`,
        index,
        businessKey,
        ingestedFile
      );
    }

    return { index, record, businessKey, sequence: sequence.value, ordinal: sequence.ordinal, isDelete };
  }

  private isDeleteRecord(record: DataRecord): boolean {
    const marker = this.config.applyAsDeletes;
    if (!marker) return false;
    if (typeof marker === 'function') return marker(record) === true;
    return marker.column in record && valuesEqual(record[marker.column], marker.equals);
  }

  /**
   * Order one key's records by sequence. Records sharing a sequence value
   * collapse to the last one in batch order.
   */
  private collapseTies(records: KeyedRecord[], metrics: MergeMetrics): KeyedRecord[] {
    const sorted = [...records].sort((a, b) => a.ordinal - b.ordinal);
    const result: KeyedRecord[] = [];

    for (const record of sorted) {
      const previous = result[result.length - 1];
      if (previous && previous.ordinal === record.ordinal) {
        result[result.length - 1] = record;
        metrics.collapsedRecords++;
      } else {
        result.push(record);
      }
    }

    return result;
  }

  private applyToChain(
    businessKey: string,
    existing: HistoricalRecord[],
    records: KeyedRecord[],
    metrics: MergeMetrics
  ): KeyOutcome {
    const working: WorkingVersion[] = [...existing].sort(compareVersions).map(record => ({
      record: { ...record },
      existing: true,
      originallyOpen: record.valid_to === null,
    }));
    let deleted = false;

    for (const incoming of records) {
      const last = working.length > 0 ? working[working.length - 1] : undefined;
      const current = last && last.record.valid_to === null ? last : undefined;

      if (this.isStale(incoming, last, current)) {
        metrics.staleRecords++;
        continue;
      }

      if (incoming.isDelete) {
        if (!current) {
          metrics.noopDeletes++;
          continue;
        }
        this.close(current, incoming.sequence, 'deleted');
        deleted = true;
        continue;
      }

      const values =
        current && this.config.ignoreNullUpdates ? this.coalesce(incoming.record, current.record) : incoming.record;

      if (current && this.sameTrackedValues(values, current.record)) {
        metrics.noopRecords++;
        continue;
      }

      if (current) this.close(current, incoming.sequence, 'superseded');
      working.push({
        record: this.openVersion(values, businessKey, incoming.sequence),
        existing: false,
        originallyOpen: false,
      });
    }

    const inserts: HistoricalRecord[] = [];
    const closes: VersionClose[] = [];
    for (const version of working) {
      if (!version.existing) {
        inserts.push(version.record);
        continue;
      }
      const { valid_from, valid_to, end_reason } = version.record;
      if (version.originallyOpen && valid_to !== null && end_reason !== null) {
        closes.push({ business_key: businessKey, valid_from, valid_to, end_reason });
      }
    }

    return { chain: working.map(version => version.record), inserts, closes, deleted };
  }

  // At or before the open version's start, or inside a deleted key's gap
  private isStale(incoming: KeyedRecord, last?: WorkingVersion, current?: WorkingVersion): boolean {
    if (current) {
      const from = sequenceOrdinal(current.record.valid_from);
      return from !== null && incoming.ordinal <= from;
    }
    if (last) {
      const to = sequenceOrdinal(last.record.valid_to);
      return to !== null && incoming.ordinal < to;
    }
    return false;
  }

  private close(version: WorkingVersion, at: SequenceValue, reason: VersionEndReason): void {
    version.record.valid_to = at;
    version.record.end_reason = reason;
  }

  private openVersion(values: DataRecord, businessKey: string, at: SequenceValue): HistoricalRecord {
    const record: DataRecord = {};
    for (const [column, value] of Object.entries(values)) {
      if (!BOOKKEEPING_COLUMNS.includes(column)) record[column] = value;
    }
    return { ...record, business_key: businessKey, valid_from: at, valid_to: null, end_reason: null };
  }

  private coalesce(incoming: DataRecord, current: DataRecord): DataRecord {
    const merged: DataRecord = { ...incoming };
    for (const [column, value] of Object.entries(current)) {
      if (BOOKKEEPING_COLUMNS.includes(column)) continue;
      if (merged[column] === null || merged[column] === undefined) merged[column] = value;
    }
    return merged;
  }

  private trackedColumns(a: DataRecord, b: DataRecord): string[] {
    if (this.config.trackHistoryColumns) return [...this.config.trackHistoryColumns];

    const excluded = new Set<string>([
      ...this.config.keys,
      this.config.sequenceBy,
      ...BOOKKEEPING_COLUMNS,
      ...(this.config.trackHistoryExceptColumns ?? []),
    ]);
    const columns = new Set([...Object.keys(a), ...Object.keys(b)]);
    return [...columns].filter(column => !excluded.has(column));
  }

  private sameTrackedValues(candidate: DataRecord, current: DataRecord): boolean {
    return this.trackedColumns(candidate, current).every(column => valuesEqual(candidate[column], current[column]));
  }
}

/**
 * One-shot merge without keeping an engine around.
 */
export function mergeBatch(
  config: ScdConfig | ScdConfigInput,
  batch: readonly DataRecord[],
  existingHistory: readonly HistoricalRecord[]
): MergeResult {
  return new ScdMergeEngine(config).merge(batch, existingHistory);
}
