import { RECENT_WINDOW_DAYS } from './config';
import type { PuzzleRecord, RankFilter, RankOrder } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const puzzleSize = (record: PuzzleRecord) => Math.min(record.width, record.height);

export const scorePerSize = (record: PuzzleRecord) => record.xp / puzzleSize(record);

export const recentCutoff = (now: Date) => new Date(now.getTime() - RECENT_WINDOW_DAYS * DAY_MS);

export const isEligible = (record: PuzzleRecord, now: Date) => record.lastDone.getTime() < recentCutoff(now).getTime();

export const rankKey = (record: PuzzleRecord, order: RankOrder) =>
  order === 'xp_by_size' ? scorePerSize(record) : record.xp;

const passesFilter = (record: PuzzleRecord, filter: RankFilter) =>
  filter === 'all' || record.difficulty === 'true_nonogram';

export const recommend = (
  records: PuzzleRecord[],
  order: RankOrder,
  filter: RankFilter,
  now = new Date()
): PuzzleRecord[] =>
  records
    .filter((record) => isEligible(record, now) && passesFilter(record, filter))
    .sort((a, b) => rankKey(b, order) - rankKey(a, order));
