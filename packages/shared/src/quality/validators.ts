/**
 * Validator registry
 *
 * Every validator is a pure, total predicate over one field value. A value of
 * the wrong type fails; no validator throws. Nulls pass unless the validator
 * states otherwise (`validate_email`, `validate_required`).
 */

import { isValidPhoneNumber } from 'libphonenumber-js';
import type { FieldValue } from '@stratum/types';
import { ConfigurationError } from '../errors';
import { asText, isNullish, upperTrim } from './text';

export type Validator = (value: FieldValue) => boolean;

export type ValidatorRegistry = ReadonlyMap<string, Validator>;

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const NRIC_PATTERN = /^[STFGM]\d{7}[A-Z]$/;

const SUPPORTED_CURRENCIES = new Set(['USD', 'RMB', 'YEN', 'SGD', 'CNY', 'JPY']);
const SUPPORTED_NATIONALITIES = new Set(['USA', 'US', 'UK', 'GB', 'SG', 'CN', 'TW', 'FR', 'DK']);
const SUPPORTED_GENDERS = new Set(['M', 'F', 'X']);

const NRIC_WEIGHTS = [2, 7, 6, 5, 4, 3, 2];

// Checksum letter tables indexed by (weighted sum + offset) % 11
const NRIC_CHECKSUM_TABLES: Record<string, { offset: number; letters: string }> = {
  S: { offset: 0, letters: 'JZIHGFEDCBA' },
  T: { offset: 4, letters: 'JZIHGFEDCBA' },
  F: { offset: 0, letters: 'XWUTRQPNMLK' },
  G: { offset: 4, letters: 'XWUTRQPNMLK' },
  M: { offset: 3, letters: 'XWUTRQPNJLK' },
};

/**
 * Expected checksum letter for a Singapore NRIC/FIN, or null when the value
 * has no valid prefix and seven digits.
 */
export function calculateNricChecksum(nric: string): string | null {
  if (nric.length !== 9) return null;

  const table = NRIC_CHECKSUM_TABLES[nric[0].toUpperCase()];
  const digits = nric.slice(1, 8);
  if (!table || !/^\d{7}$/.test(digits)) return null;

  const total = NRIC_WEIGHTS.reduce(
    (sum, weight, index) => sum + Number(digits[index]) * weight,
    table.offset
  );

  return table.letters[total % 11];
}

/** Six digits once whitespace is removed; leading zeros allowed. */
export const validateSingaporePostalCode: Validator = value => {
  if (isNullish(value)) return true;
  const text = asText(value);
  if (text === null) return false;
  return /^\d{6}$/.test(text.replace(/\s+/g, ''));
};

/** Case-sensitive: expects the uppercase form produced by `uppercase_trim`. */
export const validateSingaporeNric: Validator = value => {
  if (isNullish(value)) return true;
  if (typeof value !== 'string' || !NRIC_PATTERN.test(value)) return false;
  return calculateNricChecksum(value) === value[8];
};

/** Case-sensitive format check without checksum. */
export const validateNric9Char: Validator = value => {
  if (isNullish(value)) return true;
  return typeof value === 'string' && /^[A-Z0-9]{9}$/.test(value);
};

export const validateCurrencyCode: Validator = value => {
  if (isNullish(value)) return true;
  return typeof value === 'string' && SUPPORTED_CURRENCIES.has(upperTrim(value));
};

export const validateNationalityCode: Validator = value => {
  if (isNullish(value)) return true;
  return typeof value === 'string' && SUPPORTED_NATIONALITIES.has(upperTrim(value));
};

export const validateGender: Validator = value => {
  if (isNullish(value)) return true;
  return typeof value === 'string' && SUPPORTED_GENDERS.has(upperTrim(value));
};

/** Null fails: an address-less customer is a quality issue. */
export const validateEmail: Validator = value => {
  return typeof value === 'string' && EMAIL_PATTERN.test(value);
};

export const validatePhoneNumber: Validator = value => {
  if (isNullish(value)) return true;
  const text = asText(value);
  if (text === null) return false;
  try {
    return isValidPhoneNumber(text, 'SG');
  } catch {
    return false;
  }
};

/** Null, undefined and blank strings fail. */
export const validateRequired: Validator = value => {
  if (isNullish(value)) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (typeof value === 'number') return Number.isFinite(value);
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  return true;
};

export const VALIDATORS = {
  validate_singapore_postal_code: validateSingaporePostalCode,
  validate_singapore_nric: validateSingaporeNric,
  validate_nric_9char: validateNric9Char,
  validate_currency_code: validateCurrencyCode,
  validate_nationality_code: validateNationalityCode,
  validate_gender: validateGender,
  validate_email: validateEmail,
  validate_phone_number: validatePhoneNumber,
  validate_required: validateRequired,
} as const satisfies Record<string, Validator>;

export type BuiltInValidatorName = keyof typeof VALIDATORS;

/**
 * Build a name -> validator registry. Custom validators extend the built-in
 * set but may not shadow a built-in name.
 */
export function createValidatorRegistry(custom: Record<string, Validator> = {}): ValidatorRegistry {
  const registry = new Map<string, Validator>(Object.entries(VALIDATORS));

  for (const [name, validator] of Object.entries(custom)) {
    if (registry.has(name)) {
      throw new ConfigurationError(`Validator '${name}' is already registered`);
    }
    registry.set(name, validator);
  }

  return registry;
}

/**
 * Run a validator without letting a faulty custom implementation abort the
 * batch. A throwing validator counts as a failed check.
 */
export function runValidator(validator: Validator, value: FieldValue): boolean {
  try {
    return validator(value) === true;
  } catch {
    return false;
  }
}
