import type { HistoricalRecord, SequenceValue } from '@stratum/types';
import { ConfigurationError } from '@stratum/shared';
import { compareVersions } from './integrity';
import { formatSequence, sequenceOrdinal } from './sequence';

export function currentRecords(history: readonly HistoricalRecord[]): HistoricalRecord[] {
  return history.filter(version => version.valid_to === null);
}

/**
 * Versions valid at `at`: valid_from <= at < valid_to, with an open
 * version valid indefinitely.
 */
export function recordsAsOf(history: readonly HistoricalRecord[], at: SequenceValue): HistoricalRecord[] {
  const point = sequenceOrdinal(at);
  if (point === null) {
    throw new ConfigurationError(`Cannot query history as of '${formatSequence(at)}'`);
  }

  return history.filter(version => {
    const from = sequenceOrdinal(version.valid_from);
    if (from === null || from > point) return false;
    if (version.valid_to === null) return true;
    const to = sequenceOrdinal(version.valid_to);
    return to !== null && point < to;
  });
}

export function historyForKey(history: readonly HistoricalRecord[], businessKey: string): HistoricalRecord[] {
  return history.filter(version => version.business_key === businessKey).sort(compareVersions);
}
