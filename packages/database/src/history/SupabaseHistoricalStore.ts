import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  DataRecord,
  HistoricalRecord,
  HistoricalTableStore,
  HistoryDelta,
  SequenceValue,
} from '@stratum/types';
import { CommitError, RPC, createError, createLogger } from '@stratum/shared';

const SequenceColumn = z.union([z.string(), z.number()]);

export const HistoricalRowSchema = z
  .object({
    business_key: z.string().min(1),
    valid_from: SequenceColumn,
    valid_to: SequenceColumn.nullable(),
    end_reason: z.enum(['superseded', 'deleted']).nullable(),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean(), z.null()]));

function wireValue(value: SequenceValue): string | number {
  return value instanceof Date ? value.toISOString() : value;
}

function toWire(record: DataRecord): Record<string, string | number | boolean | null> {
  const row: Record<string, string | number | boolean | null> = {};
  for (const [column, value] of Object.entries(record)) {
    if (value === undefined) continue;
    row[column] = value instanceof Date ? value.toISOString() : value;
  }
  return row;
}

/**
 * Historical tables in Postgres. Timestamps travel as ISO strings and come
 * back as strings; sequence comparisons parse them. A delta is applied by
 * the `apply_scd2_delta` function in one transaction, which rejects a close
 * whose version is no longer open.
 */
export class SupabaseHistoricalStore implements HistoricalTableStore {
  private readonly logger = createLogger('SupabaseHistoricalStore');

  constructor(private readonly supabase: SupabaseClient) {}

  async loadHistory(table: string, businessKeys: string[]): Promise<HistoricalRecord[]> {
    if (businessKeys.length === 0) return [];

    const { data, error } = await this.supabase.from(table).select('*').in('business_key', businessKeys);
    if (error) {
      throw createError(`Failed to load history from ${table}: ${error.message}`, error);
    }
    return this.parseRows(table, data);
  }

  async commit(table: string, delta: HistoryDelta): Promise<void> {
    const { error } = await this.supabase.rpc(RPC.APPLY_SCD2_DELTA, {
      target_table: table,
      inserts: delta.inserts.map(toWire),
      closes: delta.closes.map(close => ({
        business_key: close.business_key,
        valid_from: wireValue(close.valid_from),
        valid_to: wireValue(close.valid_to),
        end_reason: close.end_reason,
      })),
    });

    if (error) {
      throw new CommitError(`Commit to ${table} rejected: ${error.message}`, error);
    }
    this.logger.debug('Delta committed', {
      table,
      inserts: delta.inserts.length,
      closes: delta.closes.length,
    });
  }

  async queryCurrent(table: string): Promise<HistoricalRecord[]> {
    const { data, error } = await this.supabase.from(table).select('*').is('valid_to', null);
    if (error) {
      throw createError(`Failed to query current records from ${table}: ${error.message}`, error);
    }
    return this.parseRows(table, data);
  }

  async queryAsOf(table: string, at: SequenceValue): Promise<HistoricalRecord[]> {
    const point = wireValue(at);

    const { data, error } = await this.supabase
      .from(table)
      .select('*')
      .lte('valid_from', point)
      .or(`valid_to.is.null,valid_to.gt.${point}`);
    if (error) {
      throw createError(`Failed to query ${table} as of ${point}: ${error.message}`, error);
    }
    return this.parseRows(table, data);
  }

  async queryHistory(table: string, businessKey: string): Promise<HistoricalRecord[]> {
    const { data, error } = await this.supabase
      .from(table)
      .select('*')
      .eq('business_key', businessKey)
      .order('valid_from', { ascending: true });
    if (error) {
      throw createError(`Failed to query history of ${businessKey} from ${table}: ${error.message}`, error);
    }
    return this.parseRows(table, data);
  }

  private parseRows(table: string, data: unknown): HistoricalRecord[] {
    const parsed = z.array(HistoricalRowSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw createError(`Malformed rows in ${table}: ${parsed.error.message}`, parsed.error);
    }
    return parsed.data;
  }
}
