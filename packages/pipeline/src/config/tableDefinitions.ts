import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, createMaskerRegistry, getErrorMessage } from '@stratum/shared';
import type { TableDefinition } from '../types';
import { ScdConfigSchema, parseScdConfig } from './ScdConfig';
import { parseTableConfig } from './TableConfig';

const AccessLevelSchema = z.enum(['full_access', 'partial_access', 'masked_only']);

export const MaskingPolicySchema = z.object({
  table: z.string().min(1),
  fields: z.record(
    z.string().min(1),
    z.object({
      masker: z.string().min(1),
      maxLevel: AccessLevelSchema.optional(),
    })
  ),
});

const TableDefinitionSchema = z.object({
  name: z.string().min(1),
  cleansing: z.record(z.unknown()).default({}),
  scd: ScdConfigSchema,
  masking: MaskingPolicySchema.optional(),
});

export const TableDefinitionsFileSchema = z.object({
  tables: z.array(TableDefinitionSchema),
});

/**
 * Validate table definitions given as data. The cleansing configuration
 * takes the table name unless it names itself.
 */
export function parseTableDefinitions(input: unknown): TableDefinition[] {
  const parsed = TableDefinitionsFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid table definitions: ${issues}`, parsed.error);
  }

  const maskers = createMaskerRegistry();
  const names = new Set<string>();

  return parsed.data.tables.map(table => {
    if (names.has(table.name)) {
      throw new ConfigurationError(`Table '${table.name}' is defined more than once`);
    }
    names.add(table.name);

    for (const [field, rule] of Object.entries(table.masking?.fields ?? {})) {
      if (!maskers.has(rule.masker)) {
        throw new ConfigurationError(`Unknown masker '${rule.masker}' for field '${field}' in table '${table.name}'`);
      }
    }

    return {
      name: table.name,
      cleansing: parseTableConfig({ name: table.name, ...table.cleansing }),
      scd: parseScdConfig(table.scd),
      masking: table.masking,
    };
  });
}

export async function loadTableDefinitions(filePath: string): Promise<TableDefinition[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read table definitions from ${filePath}: ${getErrorMessage(error)}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Table definitions in ${filePath} are not valid JSON`, error);
  }

  return parseTableDefinitions(data);
}
