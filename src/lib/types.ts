export type PuzzleCategory = 'color' | 'bw';

export type PuzzleDifficulty = 'true_nonogram' | 'other_nonogram';

export type RankOrder = 'xp' | 'xp_by_size';

export type RankFilter = 'all' | 'true_nonogram_only';

export interface PuzzleRecord {
  name: string;
  xp: number;
  width: number;
  height: number;
  difficulty: PuzzleDifficulty;
  category: PuzzleCategory;
  lastDone: Date;
}

export interface CompletionEntry {
  name: string;
  lastDone: Date;
}

export type CompletionLedger = CompletionEntry[];

export interface PuzzleCatalogs {
  color: PuzzleRecord[];
  bw: PuzzleRecord[];
}

export interface DataPaths {
  directory: string;
  color: string;
  bw: string;
  ledger: string;
}
