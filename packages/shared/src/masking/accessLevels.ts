/**
 * Access level hierarchy and helpers
 */

import type { AccessLevel } from '@stratum/types';

// Disclosure tiers, least to most revealing
export const ACCESS_LEVEL_HIERARCHY: Record<AccessLevel, number> = {
  masked_only: 1,
  partial_access: 2,
  full_access: 3,
} as const;

export function isValidAccessLevel(level: string): level is AccessLevel {
  return Object.prototype.hasOwnProperty.call(ACCESS_LEVEL_HIERARCHY, level);
}

/**
 * Positive when `a` discloses more than `b`, zero when equal.
 */
export function compareAccessLevels(a: AccessLevel, b: AccessLevel): number {
  return ACCESS_LEVEL_HIERARCHY[a] - ACCESS_LEVEL_HIERARCHY[b];
}

export function getMostRestrictiveLevel(levels: AccessLevel[]): AccessLevel | null {
  if (levels.length === 0) return null;

  return levels.reduce((lowest, current) =>
    compareAccessLevels(current, lowest) < 0 ? current : lowest
  );
}
