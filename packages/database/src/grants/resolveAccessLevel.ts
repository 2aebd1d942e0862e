import type { AccessGrantStore, AccessLevel } from '@stratum/types';
import { DEFAULT_ACCESS_LEVEL, createLogger, getErrorMessage } from '@stratum/shared';

const logger = createLogger('resolveAccessLevel');

export interface ResolveAccessOptions {
  /** Rethrow store failures instead of falling back to masked access. */
  strict?: boolean;
}

export async function resolveAccessLevel(
  store: AccessGrantStore,
  userId: string,
  at: Date,
  options: ResolveAccessOptions = {}
): Promise<AccessLevel> {
  try {
    const grant = await store.effectiveGrant(userId, at);
    return grant?.access_level ?? DEFAULT_ACCESS_LEVEL;
  } catch (error) {
    if (options.strict) throw error;

    logger.error('Grant lookup failed, falling back to masked access', {
      userId,
      error: getErrorMessage(error),
    });
    return DEFAULT_ACCESS_LEVEL;
  }
}
