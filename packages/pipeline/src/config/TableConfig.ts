import { z } from 'zod';
import { ConfigurationError, DEFAULT_NULL_SENTINEL } from '@stratum/shared';

const NameSchema = z.string().min(1);

const FieldRuleSchema = z.object({
  transformer: NameSchema.optional(),
  validators: z.array(NameSchema).default([]),
});

const DerivedFieldSchema = z.object({
  source: NameSchema,
  transformer: NameSchema,
});

/**
 * Serializable table configuration. Field rules apply in declaration order;
 * field names refer to the record after `sourcePrefix` has been applied.
 */
export const TableConfigSchema = z.object({
  name: NameSchema,
  fields: z.record(NameSchema, FieldRuleSchema).default({}),
  derivedFields: z.record(NameSchema, DerivedFieldSchema).default({}),
  uppercaseFields: z.array(NameSchema).default([]),
  fillNullFields: z.array(NameSchema).default([]),
  sourcePrefix: NameSchema.optional(),
  trimStrings: z.boolean().default(true),
  nullSentinel: z.string().default(DEFAULT_NULL_SENTINEL),
  addValidationColumns: z.boolean().default(false),
});

export type TableConfigInput = z.input<typeof TableConfigSchema>;
export type TableConfig = z.output<typeof TableConfigSchema>;
export type FieldRule = z.output<typeof FieldRuleSchema>;
export type DerivedField = z.output<typeof DerivedFieldSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function freezeConfig(config: TableConfig): TableConfig {
  for (const rule of Object.values(config.fields)) {
    Object.freeze(rule.validators);
    Object.freeze(rule);
  }
  for (const derived of Object.values(config.derivedFields)) {
    Object.freeze(derived);
  }
  Object.freeze(config.fields);
  Object.freeze(config.derivedFields);
  Object.freeze(config.uppercaseFields);
  Object.freeze(config.fillNullFields);
  return Object.freeze(config);
}

/**
 * Validate a table configuration and return a frozen copy.
 */
export function parseTableConfig(input: unknown): TableConfig {
  const parsed = TableConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid table configuration: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return freezeConfig(parsed.data);
}

function appendUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

/**
 * Fluent builder for table configurations
 */
export class TableConfigBuilder {
  private readonly fields: Record<string, { transformer?: string; validators: string[] }> = {};
  private readonly derivedFields: Record<string, DerivedField> = {};
  private readonly uppercaseFields: string[] = [];
  private readonly fillNullFields: string[] = [];
  private sourcePrefix?: string;
  private trim = true;
  private sentinel = DEFAULT_NULL_SENTINEL;
  private validationColumns = false;

  constructor(private readonly name: string) {}

  private rule(field: string): { transformer?: string; validators: string[] } {
    const existing = this.fields[field];
    if (existing) return existing;
    const created: { transformer?: string; validators: string[] } = { validators: [] };
    this.fields[field] = created;
    return created;
  }

  transform(field: string, transformer: string): this {
    const rule = this.rule(field);
    if (rule.transformer && rule.transformer !== transformer) {
      throw new ConfigurationError(
        `Field '${field}' already uses transformer '${rule.transformer}', cannot add '${transformer}'`
      );
    }
    rule.transformer = transformer;
    return this;
  }

  validate(field: string, ...validators: string[]): this {
    appendUnique(this.rule(field).validators, validators);
    return this;
  }

  derive(target: string, source: string, transformer: string): this {
    this.derivedFields[target] = { source, transformer };
    return this;
  }

  uppercase(...fields: string[]): this {
    appendUnique(this.uppercaseFields, fields);
    return this;
  }

  fillNulls(...fields: string[]): this {
    appendUnique(this.fillNullFields, fields);
    return this;
  }

  prefix(sourcePrefix: string): this {
    this.sourcePrefix = sourcePrefix;
    return this;
  }

  trimStrings(enabled: boolean): this {
    this.trim = enabled;
    return this;
  }

  nullSentinel(value: string): this {
    this.sentinel = value;
    return this;
  }

  withValidationColumns(enabled = true): this {
    this.validationColumns = enabled;
    return this;
  }

  build(): TableConfig {
    return parseTableConfig({
      name: this.name,
      fields: this.fields,
      derivedFields: this.derivedFields,
      uppercaseFields: this.uppercaseFields,
      fillNullFields: this.fillNullFields,
      sourcePrefix: this.sourcePrefix,
      trimStrings: this.trim,
      nullSentinel: this.sentinel,
      addValidationColumns: this.validationColumns,
    });
  }
}

/**
 * Combine configurations left to right. Later configurations add field
 * rules, validators and field lists; scalar options take the last value.
 * A field may not receive two different transformers.
 */
export function composeTableConfigs(name: string, ...configs: TableConfig[]): TableConfig {
  const builder = new TableConfigBuilder(name);

  for (const config of configs) {
    for (const [field, rule] of Object.entries(config.fields)) {
      if (rule.transformer) builder.transform(field, rule.transformer);
      builder.validate(field, ...rule.validators);
    }
    for (const [target, derived] of Object.entries(config.derivedFields)) {
      builder.derive(target, derived.source, derived.transformer);
    }
    builder.uppercase(...config.uppercaseFields).fillNulls(...config.fillNullFields);
    if (config.sourcePrefix) builder.prefix(config.sourcePrefix);
    builder
      .trimStrings(config.trimStrings)
      .nullSentinel(config.nullSentinel)
      .withValidationColumns(config.addValidationColumns);
  }

  return builder.build();
}

/**
 * Standard customer table: identifier, demographic and contact rules plus a
 * postal code derived from the address.
 */
export function createStandardCustomerConfig(name = 'customers'): TableConfig {
  return new TableConfigBuilder(name)
    .transform('nric', 'standardize_nric')
    .transform('gender', 'normalize_gender')
    .transform('country', 'normalize_nationality_code')
    .transform('phone', 'standardize_phone_number')
    .derive('postal_code', 'address', 'extract_postal_code_from_address')
    .transform('postal_code', 'standardize_singapore_postal_code')
    .validate('nric', 'validate_singapore_nric')
    .validate('email', 'validate_email')
    .validate('gender', 'validate_gender')
    .validate('country', 'validate_nationality_code')
    .validate('postal_code', 'validate_singapore_postal_code')
    .uppercase('full_name', 'nric', 'gender', 'country')
    .fillNulls('email', 'phone', 'address')
    .build();
}
