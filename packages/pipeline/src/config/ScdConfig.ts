import { z } from 'zod';
import type { DataRecord } from '@stratum/types';
import { ConfigurationError, PROVENANCE_COLUMNS, QUALITY_COLUMNS, TABLES, VERSION_COLUMNS } from '@stratum/shared';

const ColumnSchema = z.string().min(1);

const BOOKKEEPING_COLUMNS: readonly string[] = VERSION_COLUMNS;

export const DeleteMarkerSchema = z.object({
  column: ColumnSchema,
  equals: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

export type DeleteMarker = z.output<typeof DeleteMarkerSchema>;
export type DeletePredicate = (record: DataRecord) => boolean;

export const ScdConfigSchema = z
  .object({
    table: ColumnSchema,
    keys: z.array(ColumnSchema).min(1),
    sequenceBy: ColumnSchema,
    trackHistoryColumns: z.array(ColumnSchema).min(1).optional(),
    trackHistoryExceptColumns: z.array(ColumnSchema).optional(),
    ignoreNullUpdates: z.boolean().default(true),
    applyAsDeletes: DeleteMarkerSchema.optional(),
  })
  .refine(config => !(config.trackHistoryColumns && config.trackHistoryExceptColumns), {
    message: 'trackHistoryColumns and trackHistoryExceptColumns are mutually exclusive',
    path: ['trackHistoryColumns'],
  })
  .refine(config => !config.keys.includes(config.sequenceBy), {
    message: 'the sequence column cannot be part of the business key',
    path: ['sequenceBy'],
  })
  .refine(config => !config.keys.some(key => BOOKKEEPING_COLUMNS.includes(key)), {
    message: 'business key columns cannot be version bookkeeping columns',
    path: ['keys'],
  });

type SerializableScdConfig = z.output<typeof ScdConfigSchema>;

export type ScdConfigInput = Omit<z.input<typeof ScdConfigSchema>, 'applyAsDeletes'> & {
  applyAsDeletes?: DeleteMarker | DeletePredicate;
};

export type ScdConfig = Readonly<
  Omit<SerializableScdConfig, 'applyAsDeletes'> & {
    applyAsDeletes?: DeleteMarker | DeletePredicate;
  }
>;

/**
 * Validate an SCD configuration. Delete markers may be serializable
 * `{ column, equals }` objects or predicates supplied in code.
 */
export function parseScdConfig(input: ScdConfigInput): ScdConfig {
  const { applyAsDeletes, ...rest } = input;
  const marker = typeof applyAsDeletes === 'function' ? undefined : applyAsDeletes;

  const parsed = ScdConfigSchema.safeParse({ ...rest, applyAsDeletes: marker });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid SCD configuration for '${input.table}': ${issues}`, parsed.error);
  }

  return Object.freeze({
    ...parsed.data,
    applyAsDeletes: typeof applyAsDeletes === 'function' ? applyAsDeletes : parsed.data.applyAsDeletes,
  });
}

// Columns that change on every load without changing the entity
export const CUSTOMER_METADATA_COLUMNS = [
  ...PROVENANCE_COLUMNS,
  QUALITY_COLUMNS.PROCESSED_TS,
  QUALITY_COLUMNS.FLAGS,
  QUALITY_COLUMNS.SCORE,
  'is_valid_postal_code',
] as const;

export function createCustomerScdConfig(
  options: { table?: string; keys?: string[]; sequenceBy?: string; trackAllColumns?: boolean } = {}
): ScdConfig {
  return parseScdConfig({
    table: options.table ?? TABLES.CUSTOMERS_SILVER,
    keys: options.keys ?? ['customer_id'],
    sequenceBy: options.sequenceBy ?? QUALITY_COLUMNS.PROCESSED_TS,
    trackHistoryExceptColumns: options.trackAllColumns ? undefined : [...CUSTOMER_METADATA_COLUMNS],
    ignoreNullUpdates: true,
  });
}

export function createTransactionScdConfig(
  options: { table?: string; keys?: string[]; sequenceBy?: string; trackStatusOnly?: boolean } = {}
): ScdConfig {
  return parseScdConfig({
    table: options.table ?? 'transactions_silver',
    keys: options.keys ?? ['transaction_id'],
    sequenceBy: options.sequenceBy ?? 'transaction_ts',
    trackHistoryColumns: options.trackStatusOnly ? ['status', 'amount', 'updated_at'] : undefined,
    ignoreNullUpdates: true,
  });
}

export function createProductScdConfig(
  options: { table?: string; keys?: string[]; sequenceBy?: string; trackPriceChanges?: boolean } = {}
): ScdConfig {
  return parseScdConfig({
    table: options.table ?? 'products_silver',
    keys: options.keys ?? ['product_id'],
    sequenceBy: options.sequenceBy ?? 'updated_at',
    trackHistoryColumns:
      options.trackPriceChanges === false ? undefined : ['price', 'cost', 'availability', 'status'],
    ignoreNullUpdates: true,
  });
}

export function createGenericScdConfig(
  options: Omit<ScdConfigInput, 'sequenceBy'> & { sequenceBy?: string }
): ScdConfig {
  return parseScdConfig({ ...options, sequenceBy: options.sequenceBy ?? 'updated_at' });
}
