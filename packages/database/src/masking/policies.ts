import type { MaskingPolicy } from '@stratum/types';
import { ConfigurationError, createMaskerRegistry } from '@stratum/shared';
import type { MaskerRegistry } from '@stratum/shared';

export const CUSTOMER_MASKING_POLICY: MaskingPolicy = {
  table: 'customers',
  fields: {
    email: { masker: 'mask_email' },
    phone: { masker: 'mask_phone' },
    nric: { masker: 'mask_nric' },
    address: { masker: 'mask_address' },
  },
};

export const TABLE_MASKING_POLICIES: Readonly<Record<string, MaskingPolicy>> = {
  customers: CUSTOMER_MASKING_POLICY,
};

export function getMaskingPolicy(table: string): MaskingPolicy {
  const policy = TABLE_MASKING_POLICIES[table];
  if (!policy) {
    throw new ConfigurationError(`No masking policy for table '${table}'`);
  }
  return policy;
}

export function assertMaskingPolicy(policy: MaskingPolicy, registry: MaskerRegistry = createMaskerRegistry()): void {
  for (const [field, rule] of Object.entries(policy.fields)) {
    if (!registry.has(rule.masker)) {
      throw new ConfigurationError(`Unknown masker '${rule.masker}' for field '${field}' in table '${policy.table}'`);
    }
  }
}
