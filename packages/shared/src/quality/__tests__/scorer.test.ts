import { describe, it, expect } from '@jest/globals';
import { parseQualityFlags, scoreOutcomes, summarizeQuality } from '../scorer';

describe('Quality Scorer', () => {
  it('should score 100 with null flags when there are no checks', () => {
    expect(scoreOutcomes([])).toEqual({ data_quality_flags: null, quality_score: 100 });
  });

  it('should score 100 with null flags when every check passes', () => {
    const result = scoreOutcomes([
      { field: 'email', validator: 'validate_email', passed: true },
      { field: 'nric', validator: 'validate_singapore_nric', passed: true },
    ]);

    expect(result).toEqual({ data_quality_flags: null, quality_score: 100 });
  });

  it('should round the percentage of passed checks', () => {
    const result = scoreOutcomes([
      { field: 'email', validator: 'validate_email', passed: false },
      { field: 'nric', validator: 'validate_singapore_nric', passed: true },
      { field: 'gender', validator: 'validate_gender', passed: true },
    ]);

    expect(result.quality_score).toBe(67);
    expect(result.data_quality_flags).toBe('email_validate_email');
  });

  it('should keep a flagged record below 100 when rounding would reach it', () => {
    const outcomes = Array.from({ length: 200 }, (_, index) => ({
      field: `f${index}`,
      validator: 'validate_required',
      passed: index !== 0,
    }));

    expect(scoreOutcomes(outcomes)).toEqual({ data_quality_flags: 'f0_validate_required', quality_score: 99 });
  });

  it('should list failures in declaration order without repeats', () => {
    const result = scoreOutcomes([
      { field: 'nric', validator: 'validate_singapore_nric', passed: false },
      { field: 'email', validator: 'validate_email', passed: false },
      { field: 'nric', validator: 'validate_singapore_nric', passed: false },
    ]);

    expect(result.data_quality_flags).toBe('nric_validate_singapore_nric, email_validate_email');
    expect(result.quality_score).toBe(0);
  });

  it('should parse a flag list back into names', () => {
    expect(parseQualityFlags('a_x, b_y')).toEqual(['a_x', 'b_y']);
    expect(parseQualityFlags(null)).toEqual([]);
  });

  it('should summarize a batch', () => {
    const summary = summarizeQuality([
      { data_quality_flags: null, quality_score: 100 },
      { data_quality_flags: 'email_validate_email, nric_validate_nric_9char', quality_score: 50 },
      { data_quality_flags: 'email_validate_email', quality_score: 75 },
    ]);

    expect(summary).toEqual({
      totalRecords: 3,
      flaggedRecords: 2,
      averageScore: 75,
      minScore: 50,
      flagCounts: {
        email_validate_email: 2,
        nric_validate_nric_9char: 1,
      },
    });
  });

  it('should summarize an empty batch', () => {
    expect(summarizeQuality([])).toEqual({
      totalRecords: 0,
      flaggedRecords: 0,
      averageScore: 100,
      minScore: null,
      flagCounts: {},
    });
  });
});
