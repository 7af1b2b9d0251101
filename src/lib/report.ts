import { puzzleSize, recommend, scorePerSize } from './recommend';
import type { PuzzleCatalogs, PuzzleCategory, PuzzleRecord, RankFilter, RankOrder } from './types';

export interface ReportView {
  label: string;
  category: PuzzleCategory;
  order: RankOrder;
  filter: RankFilter;
}

export const REPORT_VIEWS: ReportView[] = [
  { label: 'color (XP)', category: 'color', order: 'xp', filter: 'all' },
  { label: 'color (XP/Size)', category: 'color', order: 'xp_by_size', filter: 'all' },
  { label: 'B&W (XP)', category: 'bw', order: 'xp', filter: 'all' },
  { label: 'B&W (XP/Size)', category: 'bw', order: 'xp_by_size', filter: 'all' },
  { label: 'true nonogram (XP)', category: 'bw', order: 'xp', filter: 'true_nonogram_only' },
  { label: 'true nonogram (XP/Size)', category: 'bw', order: 'xp_by_size', filter: 'true_nonogram_only' }
];

const LABEL_WIDTH = 24;
const NAME_WIDTH = 50;
const COUNT_WIDTH = 4;

export const describePuzzle = (record: PuzzleRecord | undefined) =>
  record
    ? `${record.name.padEnd(NAME_WIDTH)}, XP:${record.xp}, Size: ${puzzleSize(record)} (${record.width}x${record.height}), XP/Size: ${scorePerSize(record).toFixed(2)}`
    : 'NONE';

export const formatBestLine = (label: string, ranked: PuzzleRecord[], total: number) => {
  const eligible = `${String(ranked.length).padStart(COUNT_WIDTH)}/${String(total).padStart(COUNT_WIDTH)}`;
  return `Best ${label.padEnd(LABEL_WIDTH)} (${eligible} eligible): ${describePuzzle(ranked[0])}`;
};

export const renderReport = (catalogs: PuzzleCatalogs, now = new Date()): string[] =>
  REPORT_VIEWS.map((view) => {
    const records = catalogs[view.category];
    return formatBestLine(view.label, recommend(records, view.order, view.filter, now), records.length);
  });
