import { describe, it, expect } from '@jest/globals';
import type { HistoricalRecord, SequenceValue, VersionEndReason } from '@stratum/types';
import { verifyVersionChain } from '../integrity';

function version(
  validFrom: SequenceValue,
  validTo: SequenceValue | null,
  endReason: VersionEndReason | null = validTo === null ? null : 'superseded'
): HistoricalRecord {
  return { business_key: '["K1"]', valid_from: validFrom, valid_to: validTo, end_reason: endReason };
}

describe('verifyVersionChain', () => {
  it('should accept an empty chain', () => {
    expect(verifyVersionChain([])).toEqual([]);
  });

  it('should accept contiguous versions in any input order', () => {
    expect(verifyVersionChain([version(2, null), version(1, 2)])).toEqual([]);
  });

  it('should accept a gap after a deleted version', () => {
    expect(verifyVersionChain([version(1, 3, 'deleted'), version(5, null)])).toEqual([]);
    expect(verifyVersionChain([version(1, 3, 'deleted')])).toEqual([]);
  });

  it('should compare date strings and dates by instant', () => {
    const chain = [
      version('2024-01-01T00:00:00Z', new Date('2024-02-01T00:00:00Z')),
      version('2024-02-01T00:00:00.000Z', null),
    ];

    expect(verifyVersionChain(chain)).toEqual([]);
  });

  it('should report a gap after a superseded version', () => {
    expect(verifyVersionChain([version(1, 2), version(3, null)])).toEqual(['gap after version at 1']);
  });

  it('should report overlapping versions', () => {
    expect(verifyVersionChain([version(1, 3), version(2, null)])).toEqual(['versions at 1 and 2 overlap']);
  });

  it('should report more than one open version', () => {
    expect(verifyVersionChain([version(1, null), version(2, null)])).toEqual([
      'open version at 1 is not the latest version',
    ]);
  });

  it('should report inverted intervals', () => {
    expect(verifyVersionChain([version(3, 2, 'deleted')])).toEqual([
      'version at 3 has an empty or inverted interval',
    ]);
  });

  it('should report a superseded version without a successor', () => {
    expect(verifyVersionChain([version(1, 2)])).toEqual(['superseded version at 1 has no successor']);
  });

  it('should report inconsistent end reasons', () => {
    expect(verifyVersionChain([version(1, null, 'deleted')])).toEqual(["open version at 1 has end reason 'deleted'"]);
  });
});
