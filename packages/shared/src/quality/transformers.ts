/**
 * Transformer registry
 *
 * Transformers standardize a single field value. They are pure and
 * idempotent: applying one to its own output returns that output unchanged,
 * so re-cleansing already cleansed data is a no-op. Nulls pass through and
 * values without a text form are returned untouched.
 */

import { parsePhoneNumberFromString } from 'libphonenumber-js';
import type { FieldValue } from '@stratum/types';
import { ConfigurationError } from '../errors';
import { asText, upperTrim } from './text';

export type Transformer = (value: FieldValue) => FieldValue;

export type TransformerRegistry = ReadonlyMap<string, Transformer>;

const CURRENCY_ALIASES: Record<string, string> = {
  USD: 'USD',
  RMB: 'CNY',
  CNY: 'CNY',
  YEN: 'JPY',
  JPY: 'JPY',
  SGD: 'SGD',
};

const NATIONALITY_ALIASES: Record<string, string> = {
  USA: 'US',
  US: 'US',
  UK: 'GB',
  GB: 'GB',
  SG: 'SG',
  SINGAPORE: 'SG',
  CN: 'CN',
  CHINA: 'CN',
  TW: 'TW',
  TAIWAN: 'TW',
  FR: 'FR',
  FRANCE: 'FR',
  DK: 'DK',
  DENMARK: 'DK',
};

const GENDER_ALIASES: Record<string, string> = {
  M: 'M',
  MALE: 'M',
  F: 'F',
  FEMALE: 'F',
  X: 'X',
};

function mapText(value: FieldValue, fn: (text: string) => FieldValue): FieldValue {
  return typeof value === 'string' ? fn(value) : value;
}

export const trim: Transformer = value => mapText(value, text => text.trim());

export const uppercaseTrim: Transformer = value => mapText(value, upperTrim);

export const standardizeSingaporePostalCode: Transformer = value => {
  const text = asText(value);
  if (text === null) return value;
  const cleaned = text.replace(/\s+/g, '');
  return /^\d+$/.test(cleaned) && cleaned.length <= 6 ? cleaned.padStart(6, '0') : cleaned;
};

export const normalizeCurrencyCode: Transformer = value =>
  mapText(value, text => {
    const upper = upperTrim(text);
    return CURRENCY_ALIASES[upper] ?? upper;
  });

export const normalizeNationalityCode: Transformer = value =>
  mapText(value, text => {
    const upper = upperTrim(text);
    return NATIONALITY_ALIASES[upper] ?? upper;
  });

// Unknown values are kept (upper-trimmed) so validate_gender can flag them
export const normalizeGender: Transformer = value =>
  mapText(value, text => {
    const upper = upperTrim(text);
    return GENDER_ALIASES[upper] ?? upper;
  });

/**
 * Standardize to +65 form, then to E.164 when libphonenumber-js recognizes
 * the number. Inputs it cannot parse keep the +65 rule output.
 */
export const standardizePhoneNumber: Transformer = value => {
  const text = asText(value);
  if (text === null) return value;

  const cleaned = text.replace(/[^\d+]/g, '');
  let candidate = cleaned;
  if (cleaned.startsWith('+65')) {
    candidate = cleaned;
  } else if (cleaned.startsWith('65')) {
    candidate = `+${cleaned}`;
  } else if (cleaned.startsWith('0')) {
    candidate = `+65${cleaned.slice(1)}`;
  } else if (cleaned.length === 8) {
    candidate = `+65${cleaned}`;
  }

  const parsed = parsePhoneNumberFromString(candidate, 'SG');
  return parsed && parsed.isValid() ? parsed.number : candidate;
};

/** First standalone six-digit group in an address, or null. */
export const extractPostalCodeFromAddress: Transformer = value => {
  const text = asText(value);
  if (text === null) return value ?? null;
  const match = /\b(\d{6})\b/.exec(text);
  return match ? match[1] : null;
};

export const TRANSFORMERS = {
  trim,
  uppercase_trim: uppercaseTrim,
  standardize_nric: uppercaseTrim,
  normalize_name: uppercaseTrim,
  standardize_singapore_postal_code: standardizeSingaporePostalCode,
  normalize_currency_code: normalizeCurrencyCode,
  normalize_nationality_code: normalizeNationalityCode,
  normalize_gender: normalizeGender,
  standardize_phone_number: standardizePhoneNumber,
  extract_postal_code_from_address: extractPostalCodeFromAddress,
} as const satisfies Record<string, Transformer>;

export type BuiltInTransformerName = keyof typeof TRANSFORMERS;

export function createTransformerRegistry(custom: Record<string, Transformer> = {}): TransformerRegistry {
  const registry = new Map<string, Transformer>(Object.entries(TRANSFORMERS));

  for (const [name, transformer] of Object.entries(custom)) {
    if (registry.has(name)) {
      throw new ConfigurationError(`Transformer '${name}' is already registered`);
    }
    registry.set(name, transformer);
  }

  return registry;
}
