import { describe, expect, it } from 'vitest';
import { summarizeCatalog } from '../lib/catalog-summary';
import { mkPuzzle } from './helpers';

describe('summarizeCatalog', () => {
  it('counts eligible and true nonogram puzzles and flags duplicate names', () => {
    const now = new Date('2026-10-18T12:00:00.000Z');
    const summary = summarizeCatalog(
      [
        mkPuzzle({ name: 'Kite', xp: 140 }),
        mkPuzzle({ name: 'Snail', xp: 60, difficulty: 'true_nonogram', lastDone: new Date('2026-10-01T00:00:00.000Z') }),
        mkPuzzle({ name: 'Kite', xp: 90, difficulty: 'true_nonogram' })
      ],
      now
    );
    expect(summary).toEqual({ total: 3, eligible: 2, trueNonogram: 2, duplicateNames: ['Kite'], maxXp: 140 });
  });

  it('handles an empty catalog', () => {
    expect(summarizeCatalog([])).toEqual({ total: 0, eligible: 0, trueNonogram: 0, duplicateNames: [], maxXp: 0 });
  });
});
