import type { AccessLevel, DataRecord, MaskingPolicy } from '@stratum/types';
import { FULL_MASK, applyMask, createMaskerRegistry, getMostRestrictiveLevel } from '@stratum/shared';
import type { MaskerRegistry } from '@stratum/shared';

/**
 * Masks the policy's fields of one record at `level`. A field rule with a
 * `maxLevel` never discloses more than that level. Auxiliary values are read
 * from the unmasked record. Fields the policy does not name pass through.
 */
export function maskRecord(
  record: DataRecord,
  policy: MaskingPolicy,
  level: AccessLevel,
  registry: MaskerRegistry = createMaskerRegistry()
): DataRecord {
  const masked: DataRecord = { ...record };

  for (const [field, rule] of Object.entries(policy.fields)) {
    if (!(field in record)) continue;

    const masker = registry.get(rule.masker);
    if (!masker) {
      masked[field] = FULL_MASK;
      continue;
    }

    const effective = rule.maxLevel ? getMostRestrictiveLevel([level, rule.maxLevel]) ?? level : level;
    masked[field] = applyMask(masker, record[field], effective, record);
  }

  return masked;
}
