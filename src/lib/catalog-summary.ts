import { isEligible } from './recommend';
import type { PuzzleRecord } from './types';

export interface CatalogSummary {
  total: number;
  eligible: number;
  trueNonogram: number;
  duplicateNames: string[];
  maxXp: number;
}

export function summarizeCatalog(records: PuzzleRecord[], now = new Date()): CatalogSummary {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.name)) duplicates.add(record.name);
    seen.add(record.name);
  }
  return {
    total: records.length,
    eligible: records.filter((record) => isEligible(record, now)).length,
    trueNonogram: records.filter((record) => record.difficulty === 'true_nonogram').length,
    duplicateNames: [...duplicates],
    maxXp: records.reduce((max, record) => Math.max(max, record.xp), 0)
  };
}
