/**
 * SCD2 Merge Engine Tests
 */

import { describe, it, expect } from '@jest/globals';
import type { HistoricalRecord } from '@stratum/types';
import { MalformedRecordError, MergeIntegrityError } from '@stratum/shared';
import { ScdMergeEngine, mergeBatch } from '../ScdMergeEngine';
import type { ScdConfigInput } from '../../config/ScdConfig';

const K1 = '["K1"]';
const K2 = '["K2"]';

const config: ScdConfigInput = {
  table: 'customers_silver',
  keys: ['customer_id'],
  sequenceBy: 'updated_at',
  trackHistoryExceptColumns: ['ingested_file'],
  applyAsDeletes: { column: 'op', equals: 'D' },
};

function openVersion(values: Record<string, string | number | null>, validFrom: number): HistoricalRecord {
  return { ...values, business_key: K1, valid_from: validFrom, valid_to: null, end_reason: null };
}

describe('ScdMergeEngine', () => {
  const engine = new ScdMergeEngine(config);

  it('should build two versions for a key whose tracked field changes', () => {
    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'a@example.com', updated_at: 1 },
        { customer_id: 'K1', email: 'b@example.com', updated_at: 2 },
      ],
      []
    );

    expect(result.delta).toEqual({
      inserts: [
        {
          customer_id: 'K1',
          email: 'a@example.com',
          updated_at: 1,
          business_key: K1,
          valid_from: 1,
          valid_to: 2,
          end_reason: 'superseded',
        },
        {
          customer_id: 'K1',
          email: 'b@example.com',
          updated_at: 2,
          business_key: K1,
          valid_from: 2,
          valid_to: null,
          end_reason: null,
        },
      ],
      closes: [],
    });
    expect(result.metrics.insertedVersions).toBe(2);
    expect(result.rejected).toEqual([]);
    expect(result.integrityErrors).toEqual([]);
  });

  it('should close the open version and open a new one on change', () => {
    const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1)];

    const result = engine.merge([{ customer_id: 'K1', email: 'b@example.com', updated_at: 5 }], history);

    expect(result.delta.closes).toEqual([{ business_key: K1, valid_from: 1, valid_to: 5, end_reason: 'superseded' }]);
    expect(result.delta.inserts).toHaveLength(1);
    expect(result.delta.inserts[0]).toMatchObject({ email: 'b@example.com', valid_from: 5, valid_to: null });
    expect(history[0].valid_to).toBeNull();
  });

  it('should discard records that change only untracked columns', () => {
    const history = [
      openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1, ingested_file: 'day1.csv' }, 1),
    ];

    const result = engine.merge(
      [{ customer_id: 'K1', email: 'a@example.com', updated_at: 2, ingested_file: 'day2.csv' }],
      history
    );

    expect(result.delta).toEqual({ inserts: [], closes: [] });
    expect(result.metrics.noopRecords).toBe(1);
  });

  it('should keep current values for null updates by default', () => {
    const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', phone: '+6591234567', updated_at: 1 }, 1)];

    const result = engine.merge([{ customer_id: 'K1', email: null, phone: '+6598765432', updated_at: 2 }], history);

    expect(result.delta.inserts[0]).toMatchObject({ email: 'a@example.com', phone: '+6598765432' });
  });

  it('should treat a null-only update as a no-op', () => {
    const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1)];

    const result = engine.merge([{ customer_id: 'K1', email: null, updated_at: 2 }], history);

    expect(result.metrics.noopRecords).toBe(1);
    expect(result.delta.inserts).toEqual([]);
  });

  it('should let nulls overwrite when null updates are not ignored', () => {
    const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1)];

    const result = mergeBatch(
      { ...config, ignoreNullUpdates: false },
      [{ customer_id: 'K1', email: null, updated_at: 2 }],
      history
    );

    expect(result.delta.inserts[0]).toMatchObject({ email: null, valid_from: 2 });
    expect(result.delta.closes).toHaveLength(1);
  });

  it('should ignore records at or before the open version start', () => {
    const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 5 }, 5)];

    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'old@example.com', updated_at: 3 },
        { customer_id: 'K1', email: 'same@example.com', updated_at: 5 },
      ],
      history
    );

    expect(result.delta).toEqual({ inserts: [], closes: [] });
    expect(result.metrics.staleRecords).toBe(2);
  });

  describe('Deletes', () => {
    it('should close the open version as deleted', () => {
      const history = [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1)];

      const result = engine.merge([{ customer_id: 'K1', op: 'D', updated_at: 4 }], history);

      expect(result.delta).toEqual({
        inserts: [],
        closes: [{ business_key: K1, valid_from: 1, valid_to: 4, end_reason: 'deleted' }],
      });
      expect(result.metrics.deletedKeys).toBe(1);
    });

    it('should count a delete for a key without an open version as a no-op', () => {
      const result = engine.merge([{ customer_id: 'K1', op: 'D', updated_at: 4 }], []);

      expect(result.delta).toEqual({ inserts: [], closes: [] });
      expect(result.metrics.noopDeletes).toBe(1);
    });

    it('should reopen a deleted key after the delete point only', () => {
      const history: HistoricalRecord[] = [
        {
          customer_id: 'K1',
          email: 'a@example.com',
          updated_at: 1,
          business_key: K1,
          valid_from: 1,
          valid_to: 4,
          end_reason: 'deleted',
        },
      ];

      const result = engine.merge(
        [
          { customer_id: 'K1', email: 'late@example.com', updated_at: 3 },
          { customer_id: 'K1', email: 'back@example.com', updated_at: 6 },
        ],
        history
      );

      expect(result.metrics.staleRecords).toBe(1);
      expect(result.delta.closes).toEqual([]);
      expect(result.delta.inserts).toEqual([
        {
          customer_id: 'K1',
          email: 'back@example.com',
          updated_at: 6,
          business_key: K1,
          valid_from: 6,
          valid_to: null,
          end_reason: null,
        },
      ]);
    });

    it('should support delete predicates', () => {
      const result = mergeBatch(
        { ...config, applyAsDeletes: record => record.deleted === true },
        [
          { customer_id: 'K1', email: 'a@example.com', updated_at: 1 },
          { customer_id: 'K1', deleted: true, updated_at: 2 },
        ],
        []
      );

      expect(result.delta.inserts).toEqual([
        {
          customer_id: 'K1',
          email: 'a@example.com',
          updated_at: 1,
          business_key: K1,
          valid_from: 1,
          valid_to: 2,
          end_reason: 'deleted',
        },
      ]);
    });
  });

  it('should collapse records sharing a key and sequence value to the last one', () => {
    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'first@example.com', updated_at: 7 },
        { customer_id: 'K1', email: 'second@example.com', updated_at: 7 },
      ],
      []
    );

    expect(result.metrics.collapsedRecords).toBe(1);
    expect(result.delta.inserts).toHaveLength(1);
    expect(result.delta.inserts[0].email).toBe('second@example.com');
  });

  it('should order records by sequence, not by arrival', () => {
    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'b@example.com', updated_at: 2 },
        { customer_id: 'K1', email: 'a@example.com', updated_at: 1 },
      ],
      []
    );

    expect(result.delta.inserts.map(version => [version.email, version.valid_from, version.valid_to])).toEqual([
      ['a@example.com', 1, 2],
      ['b@example.com', 2, null],
    ]);
  });

  it('should order numeric text sequences as numbers', () => {
    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'a@example.com', updated_at: '9' },
        { customer_id: 'K1', email: 'c@example.com', updated_at: '13' },
        { customer_id: 'K1', email: 'b@example.com', updated_at: '10' },
      ],
      []
    );

    expect(result.rejected).toEqual([]);
    expect(result.delta.inserts.map(version => [version.email, version.valid_from, version.valid_to])).toEqual([
      ['a@example.com', '9', '10'],
      ['b@example.com', '10', '13'],
      ['c@example.com', '13', null],
    ]);
  });

  it('should reject malformed records with context and merge the rest', () => {
    const result = engine.merge(
      [
        { email: 'nokey@example.com', updated_at: 1, ingested_file: 'day1.csv' },
        { customer_id: 'K2', email: 'noseq@example.com', updated_at: 'not a date' },
        { customer_id: 'K1', email: 'a@example.com', updated_at: 1 },
      ],
      []
    );

    expect(result.rejected).toHaveLength(2);
    expect(result.rejected[0]).toBeInstanceOf(MalformedRecordError);
    expect(result.rejected[0]).toMatchObject({ index: 0, businessKey: null, ingestedFile: 'day1.csv' });
    expect(result.rejected[1]).toMatchObject({ index: 1, businessKey: K2 });
    expect(result.metrics.rejectedRecords).toBe(2);
    expect(result.delta.inserts.map(version => version.business_key)).toEqual([K1]);
  });

  it('should leave keys with inconsistent history untouched', () => {
    const history: HistoricalRecord[] = [
      openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1),
      openVersion({ customer_id: 'K1', email: 'b@example.com', updated_at: 2 }, 2),
    ];

    const result = engine.merge(
      [
        { customer_id: 'K1', email: 'c@example.com', updated_at: 3 },
        { customer_id: 'K2', email: 'd@example.com', updated_at: 3 },
      ],
      history
    );

    expect(result.integrityErrors).toHaveLength(1);
    expect(result.integrityErrors[0]).toBeInstanceOf(MergeIntegrityError);
    expect(result.integrityErrors[0].businessKey).toBe(K1);
    expect(result.metrics.corruptKeys).toBe(1);
    expect(result.metrics.skippedRecords).toBe(1);
    expect(result.delta.inserts.map(version => version.business_key)).toEqual([K2]);
  });

  it('should compare only the configured history columns', () => {
    const tracked = new ScdMergeEngine({
      table: 'products_silver',
      keys: ['product_id'],
      sequenceBy: 'updated_at',
      trackHistoryColumns: ['price'],
    });
    const history: HistoricalRecord[] = [
      {
        product_id: 'P1',
        price: 10,
        name: 'Kettle',
        updated_at: 1,
        business_key: '["P1"]',
        valid_from: 1,
        valid_to: null,
        end_reason: null,
      },
    ];

    const renamed = tracked.merge([{ product_id: 'P1', price: 10, name: 'Electric kettle', updated_at: 2 }], history);
    const repriced = tracked.merge([{ product_id: 'P1', price: 12, name: 'Kettle', updated_at: 2 }], history);

    expect(renamed.metrics.noopRecords).toBe(1);
    expect(repriced.delta.closes).toHaveLength(1);
    expect(repriced.delta.inserts[0]).toMatchObject({ price: 12, valid_from: 2 });
  });

  it('should key records on every key column', () => {
    const composite = new ScdMergeEngine({ table: 'balances', keys: ['account_id', 'currency'], sequenceBy: 'as_of' });

    expect(composite.businessKeyOf({ account_id: 'A1', currency: 'SGD' })).toBe('["A1","SGD"]');
    expect(composite.businessKeyOf({ account_id: 'A1', currency: ' ' })).toBeNull();
  });

  it('should order date sequences by instant', () => {
    const dated = new ScdMergeEngine({ table: 'customers_silver', keys: ['customer_id'], sequenceBy: 'silver_processed_ts' });

    const result = dated.merge(
      [
        { customer_id: 'K1', email: 'b@example.com', silver_processed_ts: new Date('2024-01-02T00:00:00Z') },
        { customer_id: 'K1', email: 'a@example.com', silver_processed_ts: '2024-01-01T00:00:00Z' },
      ],
      []
    );

    expect(result.delta.inserts.map(version => version.email)).toEqual(['a@example.com', 'b@example.com']);
    expect(result.delta.inserts[0].valid_to).toEqual(new Date('2024-01-02T00:00:00Z'));
  });

  it('should produce an empty delta for an empty batch', () => {
    const result = engine.merge([], [openVersion({ customer_id: 'K1', email: 'a@example.com', updated_at: 1 }, 1)]);

    expect(result.delta).toEqual({ inserts: [], closes: [] });
    expect(result.metrics.inputRecords).toBe(0);
  });
});
