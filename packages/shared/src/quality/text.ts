import type { FieldValue } from '@stratum/types';

export function isNullish(value: FieldValue): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Text view of a scalar value. Strings pass through, finite numbers are
 * stringified, everything else has no text form.
 */
export function asText(value: FieldValue): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function upperTrim(value: string): string {
  return value.trim().toUpperCase();
}
