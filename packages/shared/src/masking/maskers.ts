/**
 * PII masking functions
 *
 * Each masker knows how to partially mask one kind of field and what the
 * fully masked form looks like. `applyMask` dispatches on the access level
 * and never throws: input a partial mask cannot handle falls back to the
 * fully masked form. Null stays null with full or partial access; masked
 * access always yields the fully masked form, so it never reveals whether
 * a value exists.
 */

import { parsePhoneNumberFromString } from 'libphonenumber-js';
import type { AccessLevel, DataRecord, FieldValue } from '@stratum/types';

export interface FieldMasker {
  /** Partially masked form, or null when the input is malformed. */
  partial(value: string, auxiliary: DataRecord): string | null;
  full: string;
  /** Other columns of the same record the partial mask reads. */
  auxiliaryFields: readonly string[];
}

export type MaskerRegistry = ReadonlyMap<string, FieldMasker>;

export const FULL_MASK = '***';
export const FULL_EMAIL_MASK = '***@***';

export const maskEmail: FieldMasker = {
  full: FULL_EMAIL_MASK,
  auxiliaryFields: [],
  partial(value) {
    const parts = value.split('@');
    if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0) return null;
    return `${parts[0][0]}***@${parts[1]}`;
  },
};

export const maskPhone: FieldMasker = {
  full: FULL_MASK,
  auxiliaryFields: [],
  partial(value) {
    const compact = value.replace(/\s+/g, '');
    if (!/^\+?\d{8,15}$/.test(compact)) return null;
    if (!compact.startsWith('+')) return `****${compact.slice(-4)}`;
    const parsed = parsePhoneNumberFromString(compact);
    return parsed ? `+${parsed.countryCallingCode} ****${compact.slice(-4)}` : null;
  },
};

export const maskNric: FieldMasker = {
  full: FULL_MASK,
  auxiliaryFields: [],
  partial(value) {
    if (!/^[A-Za-z0-9]{9}$/.test(value)) return null;
    return `${value[0]}****${value.slice(-3)}`;
  },
};

export const maskAddress: FieldMasker = {
  full: FULL_MASK,
  auxiliaryFields: ['postal_code'],
  partial(value, auxiliary) {
    const postal = auxiliary.postal_code;
    if (typeof postal === 'string' && /^\d{6}$/.test(postal)) {
      return `*** Singapore ${postal}`;
    }
    const match = /\b(\d{6})\b/.exec(value);
    return match ? `*** Singapore ${match[1]}` : null;
  },
};

export const maskSsn: FieldMasker = {
  full: FULL_MASK,
  auxiliaryFields: [],
  partial(value) {
    const digits = value.replace(/\D/g, '');
    if (digits.length < 4) return null;
    return `***-**-${digits.slice(-4)}`;
  },
};

export const MASKERS = {
  mask_email: maskEmail,
  mask_phone: maskPhone,
  mask_nric: maskNric,
  mask_address: maskAddress,
  mask_ssn: maskSsn,
} as const satisfies Record<string, FieldMasker>;

export type BuiltInMaskerName = keyof typeof MASKERS;

export function createMaskerRegistry(custom: Record<string, FieldMasker> = {}): MaskerRegistry {
  return new Map<string, FieldMasker>([...Object.entries(MASKERS), ...Object.entries(custom)]);
}

export function applyMask(
  masker: FieldMasker,
  value: FieldValue,
  level: AccessLevel,
  auxiliary: DataRecord = {}
): FieldValue {
  if (level === 'masked_only') return masker.full;
  if (value === null || value === undefined) return null;

  switch (level) {
    case 'full_access':
      return value;
    case 'partial_access': {
      if (typeof value !== 'string') return masker.full;
      try {
        return masker.partial(value, auxiliary) ?? masker.full;
      } catch {
        return masker.full;
      }
    }
    default:
      return masker.full;
  }
}
