import type { CleansedRecord, DataRecord, FieldValue, RawRecord } from '@stratum/types';
import {
  ConfigurationError,
  PROVENANCE_COLUMNS,
  QUALITY_COLUMNS,
  VALIDATION_COLUMN_PREFIX,
  createLogger,
  createTransformerRegistry,
  createValidatorRegistry,
  isNullish,
  qualityFlagName,
  runValidator,
  scoreOutcomes,
  summarizeQuality,
} from '@stratum/shared';
import type { Transformer, ValidationOutcome, Validator } from '@stratum/shared';
import { parseTableConfig } from '../config/TableConfig';
import type { TableConfig, TableConfigInput } from '../config/TableConfig';
import type { CleansingResult } from '../types';

export interface CleansingBuilderOptions {
  validators?: Record<string, Validator>;
  transformers?: Record<string, Transformer>;
  now?: () => Date;
}

interface BoundRule {
  field: string;
  transformer?: Transformer;
  validators: Array<{ name: string; validate: Validator }>;
}

interface BoundDerivedField {
  target: string;
  source: string;
  transformer: Transformer;
}

// Columns that keep their name when a source prefix is applied
const UNPREFIXED_COLUMNS: ReadonlySet<string> = new Set<string>([
  ...PROVENANCE_COLUMNS,
  QUALITY_COLUMNS.FLAGS,
  QUALITY_COLUMNS.SCORE,
  QUALITY_COLUMNS.PROCESSED_TS,
]);

/**
 * Cleansing Builder
 *
 * Turns raw records into cleansed records for one table configuration:
 * standardizes values, validates them and attaches quality metadata. Every
 * input record yields exactly one output record; failing records are kept
 * and flagged. Registry names are resolved when the builder is created, so a
 * misconfigured table fails before any record is processed.
 */
export class CleansingBuilder {
  readonly config: TableConfig;
  private readonly rules: BoundRule[];
  private readonly derivedFields: BoundDerivedField[];
  private readonly now: () => Date;
  private readonly logger = createLogger('CleansingBuilder');

  constructor(config: TableConfig | TableConfigInput, options: CleansingBuilderOptions = {}) {
    this.config = parseTableConfig(config);
    this.now = options.now ?? (() => new Date());

    const validators = createValidatorRegistry(options.validators);
    const transformers = createTransformerRegistry(options.transformers);

    const resolveTransformer = (name: string, field: string): Transformer => {
      const transformer = transformers.get(name);
      if (!transformer) {
        throw new ConfigurationError(
          `Unknown transformer '${name}' for field '${field}' in table '${this.config.name}'`
        );
      }
      return transformer;
    };

    this.rules = Object.entries(this.config.fields).map(([field, rule]) => ({
      field,
      transformer: rule.transformer ? resolveTransformer(rule.transformer, field) : undefined,
      validators: rule.validators.map(name => {
        const validate = validators.get(name);
        if (!validate) {
          throw new ConfigurationError(
            `Unknown validator '${name}' for field '${field}' in table '${this.config.name}'`
          );
        }
        return { name, validate };
      }),
    }));

    this.derivedFields = Object.entries(this.config.derivedFields).map(([target, derived]) => ({
      target,
      source: derived.source,
      transformer: resolveTransformer(derived.transformer, target),
    }));
  }

  cleanse(records: readonly RawRecord[]): CleansingResult {
    const processedAt = this.now();
    const cleansed = records.map(record => this.cleanseRecord(record, processedAt));
    const summary = summarizeQuality(cleansed);

    this.logger.info('Batch cleansed', {
      table: this.config.name,
      records: summary.totalRecords,
      flaggedRecords: summary.flaggedRecords,
      averageScore: summary.averageScore,
    });

    return { records: cleansed, summary };
  }

  cleanseRecord(raw: RawRecord, processedAt: Date = this.now()): CleansedRecord {
    const { fillNullFields, nullSentinel, uppercaseFields } = this.config;
    const record = this.applyPrefix(raw);

    // Values filled by an earlier run count as missing again
    for (const field of fillNullFields) {
      if (record[field] === nullSentinel) record[field] = null;
    }

    if (this.config.trimStrings) {
      for (const [field, value] of Object.entries(record)) {
        if (typeof value === 'string') record[field] = value.trim();
      }
    }

    for (const derived of this.derivedFields) {
      record[derived.target] = derived.transformer(record[derived.source] ?? null);
    }

    for (const rule of this.rules) {
      if (rule.transformer && rule.field in record) {
        record[rule.field] = rule.transformer(record[rule.field]);
      }
    }

    const outcomes: ValidationOutcome[] = [];
    for (const rule of this.rules) {
      const value: FieldValue = record[rule.field] ?? null;
      for (const { name, validate } of rule.validators) {
        const passed = runValidator(validate, value);
        outcomes.push({ field: rule.field, validator: name, passed });
        if (this.config.addValidationColumns) {
          record[`${VALIDATION_COLUMN_PREFIX}${qualityFlagName(rule.field, name)}`] = passed;
        }
      }
    }
    const quality = scoreOutcomes(outcomes);

    for (const field of fillNullFields) {
      if (isNullish(record[field])) record[field] = nullSentinel;
    }

    for (const field of uppercaseFields) {
      const value = record[field];
      if (typeof value === 'string' && value !== nullSentinel) {
        record[field] = value.trim().toUpperCase();
      }
    }

    return { ...record, ...quality, silver_processed_ts: processedAt };
  }

  private applyPrefix(raw: RawRecord): DataRecord {
    const prefix = this.config.sourcePrefix;
    if (!prefix) return { ...raw };

    const record: DataRecord = {};
    for (const [field, value] of Object.entries(raw)) {
      const keep =
        field.startsWith(prefix) || UNPREFIXED_COLUMNS.has(field) || field.startsWith(VALIDATION_COLUMN_PREFIX);
      record[keep ? field : `${prefix}${field}`] = value;
    }
    return record;
  }
}
