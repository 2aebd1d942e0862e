import type { AccessGrantStore, DataRecord, MaskedRecord, MaskingPolicy } from '@stratum/types';
import { createLogger, createMaskerRegistry } from '@stratum/shared';
import type { MaskerRegistry } from '@stratum/shared';
import { resolveAccessLevel } from '../grants/resolveAccessLevel';
import { assertMaskingPolicy } from './policies';
import { maskRecord } from './maskRecord';

export interface MaskingEvaluatorOptions {
  registry?: MaskerRegistry;
  now?: () => Date;
  strict?: boolean;
}

/**
 * Masking Evaluator - projects silver records into a user's masked view
 *
 * The user's grant is resolved on every call, so grant changes take effect
 * on the next projection.
 */
export class MaskingEvaluator {
  private readonly registry: MaskerRegistry;
  private readonly now: () => Date;
  private readonly strict: boolean;
  private readonly logger = createLogger('MaskingEvaluator');

  constructor(
    private readonly grants: AccessGrantStore,
    options: MaskingEvaluatorOptions = {}
  ) {
    this.registry = options.registry ?? createMaskerRegistry();
    this.now = options.now ?? (() => new Date());
    this.strict = options.strict ?? false;
  }

  async project(
    userId: string,
    records: readonly DataRecord[],
    policy: MaskingPolicy,
    options: { at?: Date } = {}
  ): Promise<MaskedRecord[]> {
    assertMaskingPolicy(policy, this.registry);

    const maskedAt = this.now();
    const level = await resolveAccessLevel(this.grants, userId, options.at ?? maskedAt, { strict: this.strict });

    this.logger.debug('Projecting masked view', {
      table: policy.table,
      userId,
      level,
      records: records.length,
    });

    return records.map(record => ({
      ...maskRecord(record, policy, level, this.registry),
      masked_at: maskedAt,
      masked_for_user: userId,
      applied_access_level: level,
    }));
  }
}
