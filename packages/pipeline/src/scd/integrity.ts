import type { HistoricalRecord } from '@stratum/types';
import { formatSequence, sequenceOrdinal } from './sequence';

// Unusable valid_from values sort first
export function compareVersions(a: HistoricalRecord, b: HistoricalRecord): number {
  const aFrom = sequenceOrdinal(a.valid_from) ?? Number.MIN_SAFE_INTEGER;
  const bFrom = sequenceOrdinal(b.valid_from) ?? Number.MIN_SAFE_INTEGER;
  return aFrom - bFrom;
}

/**
 * Check the version chain of one business key. Returns the problems found;
 * an empty list means the intervals are non-overlapping, superseded versions
 * are followed without a gap and at most one version is open, and it is the
 * latest.
 */
export function verifyVersionChain(versions: readonly HistoricalRecord[]): string[] {
  const problems: string[] = [];
  const chain = [...versions].sort(compareVersions);

  chain.forEach((version, index) => {
    const from = sequenceOrdinal(version.valid_from);
    if (from === null) {
      problems.push(`version ${index} has an unusable valid_from`);
      return;
    }

    if (version.valid_to === null) {
      if (version.end_reason !== null) {
        problems.push(`open version at ${formatSequence(version.valid_from)} has end reason '${version.end_reason}'`);
      }
      if (index !== chain.length - 1) {
        problems.push(`open version at ${formatSequence(version.valid_from)} is not the latest version`);
      }
      return;
    }

    const to = sequenceOrdinal(version.valid_to);
    if (to === null || to <= from) {
      problems.push(`version at ${formatSequence(version.valid_from)} has an empty or inverted interval`);
      return;
    }
    if (version.end_reason === null) {
      problems.push(`closed version at ${formatSequence(version.valid_from)} has no end reason`);
    }

    const next = chain[index + 1];
    if (!next) {
      if (version.end_reason === 'superseded') {
        problems.push(`superseded version at ${formatSequence(version.valid_from)} has no successor`);
      }
      return;
    }

    const nextFrom = sequenceOrdinal(next.valid_from);
    if (nextFrom === null) return;
    if (nextFrom < to) {
      problems.push(`versions at ${formatSequence(version.valid_from)} and ${formatSequence(next.valid_from)} overlap`);
    } else if (version.end_reason === 'superseded' && nextFrom > to) {
      problems.push(`gap after version at ${formatSequence(version.valid_from)}`);
    }
  });

  return problems;
}
