import type { HistoricalRecord, HistoricalTableStore, HistoryDelta, SequenceValue } from '@stratum/types';
import { CommitError, createLogger } from '@stratum/shared';
import { verifyVersionChain } from '../scd/integrity';
import { currentRecords, historyForKey, recordsAsOf } from '../scd/queries';
import { formatSequence, sequenceOrdinal } from '../scd/sequence';

function copy(records: readonly HistoricalRecord[]): HistoricalRecord[] {
  return records.map(record => ({ ...record }));
}

function sameInstant(a: SequenceValue, b: SequenceValue): boolean {
  return sequenceOrdinal(a) === sequenceOrdinal(b);
}

/**
 * Process-local historical table store. A commit is validated against the
 * current table state in full before it replaces that state, so a rejected
 * commit leaves the table exactly as it was.
 */
export class InMemoryHistoricalStore implements HistoricalTableStore {
  private readonly tables = new Map<string, HistoricalRecord[]>();
  private readonly logger = createLogger('InMemoryHistoricalStore');

  constructor(seed: Record<string, HistoricalRecord[]> = {}) {
    for (const [table, records] of Object.entries(seed)) {
      this.tables.set(table, copy(records));
    }
  }

  async loadHistory(table: string, businessKeys: string[]): Promise<HistoricalRecord[]> {
    const keys = new Set(businessKeys);
    return copy(this.rows(table).filter(record => keys.has(record.business_key)));
  }

  async commit(table: string, delta: HistoryDelta): Promise<void> {
    const next = copy(this.rows(table));
    const touched = new Set<string>();

    for (const close of delta.closes) {
      const open = next.find(
        record =>
          record.business_key === close.business_key &&
          record.valid_to === null &&
          sameInstant(record.valid_from, close.valid_from)
      );
      if (!open) {
        throw new CommitError(
          `No open version of ${close.business_key} starting at ${formatSequence(close.valid_from)} in ${table}`
        );
      }
      open.valid_to = close.valid_to;
      open.end_reason = close.end_reason;
      touched.add(close.business_key);
    }

    for (const insert of delta.inserts) {
      const duplicate = next.some(
        record => record.business_key === insert.business_key && sameInstant(record.valid_from, insert.valid_from)
      );
      if (duplicate) {
        throw new CommitError(
          `Version of ${insert.business_key} starting at ${formatSequence(insert.valid_from)} already exists in ${table}`
        );
      }
      next.push({ ...insert });
      touched.add(insert.business_key);
    }

    for (const businessKey of touched) {
      const problems = verifyVersionChain(historyForKey(next, businessKey));
      if (problems.length > 0) {
        throw new CommitError(`Commit would corrupt ${businessKey} in ${table}: ${problems.join('; ')}`);
      }
    }

    this.tables.set(table, next);
    this.logger.debug('Delta committed', {
      table,
      inserts: delta.inserts.length,
      closes: delta.closes.length,
    });
  }

  async queryCurrent(table: string): Promise<HistoricalRecord[]> {
    return copy(currentRecords(this.rows(table)));
  }

  async queryAsOf(table: string, at: SequenceValue): Promise<HistoricalRecord[]> {
    return copy(recordsAsOf(this.rows(table), at));
  }

  async queryHistory(table: string, businessKey: string): Promise<HistoricalRecord[]> {
    return copy(historyForKey(this.rows(table), businessKey));
  }

  snapshot(table: string): HistoricalRecord[] {
    return copy(this.rows(table));
  }

  private rows(table: string): HistoricalRecord[] {
    return this.tables.get(table) ?? [];
  }
}
