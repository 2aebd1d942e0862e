import type { QualityMetadata } from '@stratum/types';
import { QUALITY_FLAG_SEPARATOR } from '../constants';

export interface ValidationOutcome {
  field: string;
  validator: string;
  passed: boolean;
}

export interface QualitySummary {
  totalRecords: number;
  flaggedRecords: number;
  averageScore: number;
  minScore: number | null;
  flagCounts: Record<string, number>;
}

export function qualityFlagName(field: string, validator: string): string {
  return `${field}_${validator}`;
}

/**
 * Fold validator outcomes into quality metadata. The score is the rounded
 * percentage of passed checks (100 with no checks); flags list failed checks
 * in outcome order without repeats, or null when nothing failed.
 */
export function scoreOutcomes(outcomes: ValidationOutcome[]): QualityMetadata {
  if (outcomes.length === 0) {
    return { data_quality_flags: null, quality_score: 100 };
  }

  const passed = outcomes.filter(outcome => outcome.passed).length;
  const flags: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.passed) continue;
    const name = qualityFlagName(outcome.field, outcome.validator);
    if (!flags.includes(name)) flags.push(name);
  }

  const score = Math.round((100 * passed) / outcomes.length);

  // 100 is reserved for records without flags
  return {
    data_quality_flags: flags.length > 0 ? flags.join(QUALITY_FLAG_SEPARATOR) : null,
    quality_score: flags.length > 0 ? Math.min(99, score) : score,
  };
}

export function parseQualityFlags(flags: string | null): string[] {
  if (!flags) return [];
  return flags.split(QUALITY_FLAG_SEPARATOR).filter(flag => flag.length > 0);
}

export function summarizeQuality(records: QualityMetadata[]): QualitySummary {
  const flagCounts: Record<string, number> = {};
  let flaggedRecords = 0;
  let scoreTotal = 0;
  let minScore: number | null = null;

  for (const record of records) {
    scoreTotal += record.quality_score;
    minScore = minScore === null ? record.quality_score : Math.min(minScore, record.quality_score);

    const flags = parseQualityFlags(record.data_quality_flags);
    if (flags.length > 0) flaggedRecords++;
    for (const flag of flags) {
      flagCounts[flag] = (flagCounts[flag] ?? 0) + 1;
    }
  }

  return {
    totalRecords: records.length,
    flaggedRecords,
    averageScore: records.length > 0 ? Math.round((scoreTotal / records.length) * 100) / 100 : 100,
    minScore,
    flagCounts,
  };
}
