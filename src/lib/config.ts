import path from 'node:path';
import type { DataPaths, PuzzleCategory } from './types';

export const RECENT_WINDOW_DAYS = 31;
export const TRUE_NONOGRAM_MARKER = 'True_nonogram_icon.png';

// Earliest representable Date; ledger lookups fall back to it for puzzles never marked done.
export const NEVER_DONE = new Date(-8.64e15);

export const NAME_COLUMN = 'Puzzle ID:Puzzle Name';
export const XP_COLUMN_INDEX = 4;
export const SIZE_COLUMN = 'Size';
export const TYPE_COLUMN = 'Puzzle<br>type';

export const LEDGER_NAME_COLUMN = 'Name';
export const LEDGER_LAST_DONE_COLUMN = 'LastDone';

export const DATA_DIR = 'config';

export const CATALOG_FILES: Record<PuzzleCategory, string> = {
  color: 'Colors.csv',
  bw: 'BWs.csv'
};
export const LEDGER_FILE = 'LastDonePuzzles.csv';

export function resolveDataPaths(cwd = process.cwd()): DataPaths {
  const directory = path.resolve(cwd, DATA_DIR);
  return {
    directory,
    color: path.join(directory, CATALOG_FILES.color),
    bw: path.join(directory, CATALOG_FILES.bw),
    ledger: path.join(directory, LEDGER_FILE)
  };
}
