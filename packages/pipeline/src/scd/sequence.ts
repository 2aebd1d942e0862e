import type { DataRecord, FieldValue, SequenceValue } from '@stratum/types';

const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;
const ISO_DATE_TEXT = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)?)?$/;

/**
 * Numeric position of a sequence value. Numbers and numeric text order as
 * numbers, dates and ISO-8601 date text by epoch milliseconds. Anything else
 * is unusable (null).
 */
export function sequenceOrdinal(value: FieldValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (NUMERIC_TEXT.test(text)) return Number(text);
    if (!ISO_DATE_TEXT.test(text)) return null;
    const time = Date.parse(text);
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

export function formatSequence(value: FieldValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function readSequence(value: FieldValue): { value: SequenceValue; ordinal: number } | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;
  const ordinal = sequenceOrdinal(value);
  return ordinal === null ? null : { value, ordinal };
}

function keyPart(value: FieldValue): string | number | boolean | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value;
}

/**
 * Stable string identity of a record's key columns, or null when any key
 * column is missing or blank.
 */
export function businessKeyOf(keys: readonly string[], record: DataRecord): string | null {
  const parts: Array<string | number | boolean> = [];
  for (const key of keys) {
    const part = keyPart(record[key]);
    if (part === null) return null;
    parts.push(part);
  }
  return JSON.stringify(parts);
}

export function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing && bMissing;
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  return a === b;
}
