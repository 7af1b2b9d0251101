import { NAME_COLUMN, NEVER_DONE, SIZE_COLUMN, TRUE_NONOGRAM_MARKER, TYPE_COLUMN, XP_COLUMN_INDEX } from './config';
import { cellValue, readCsvTable, resolveColumn, type ColumnRef, type CsvRow, type CsvTable } from './csv-table';
import { DataFileError } from './errors';
import { lookupLastDone } from './ledger';
import type { CompletionLedger, DataPaths, PuzzleCatalogs, PuzzleCategory, PuzzleDifficulty, PuzzleRecord } from './types';

interface FieldRule<T> {
  column: ColumnRef;
  extract: (raw: string) => T;
}

type BoundField<T> = (row: CsvRow, rowIndex: number) => T;

export interface Dimensions {
  width: number;
  height: number;
}

const INTEGER = /^[+-]?\d+$/;
const SIZE = /^\s*(\d+)\s*x\s*(\d+)\s*$/;

// Catalog XP cells are sometimes estimates written as "~120".
export function parseXp(raw: string): number {
  const cleaned = raw.replaceAll('~', '').trim();
  if (!INTEGER.test(cleaned)) throw new Error(`invalid XP "${raw}"`);
  const xp = Number.parseInt(cleaned, 10);
  if (!Number.isSafeInteger(xp)) throw new Error(`XP "${raw}" is out of range`);
  return xp;
}

export function parseSize(raw: string): Dimensions {
  const match = SIZE.exec(raw);
  if (!match) throw new Error(`invalid size "${raw}", expected WxH`);
  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) throw new Error(`invalid size "${raw}", dimensions must be positive`);
  return { width, height };
}

export const classifyDifficulty = (raw: string): PuzzleDifficulty =>
  raw.includes(TRUE_NONOGRAM_MARKER) ? 'true_nonogram' : 'other_nonogram';

const field = <T>(column: ColumnRef, extract: (raw: string) => T): FieldRule<T> => ({ column, extract });

export const CATALOG_FIELDS = {
  name: field({ name: NAME_COLUMN }, (raw) => raw),
  xp: field({ index: XP_COLUMN_INDEX }, parseXp),
  size: field({ name: SIZE_COLUMN }, parseSize),
  difficulty: field({ name: TYPE_COLUMN }, classifyDifficulty)
};

function bindField<T>(table: CsvTable, rule: FieldRule<T>): BoundField<T> {
  const column = resolveColumn(table, rule.column);
  return (row, rowIndex) => {
    const raw = cellValue(table, row, column, rowIndex);
    try {
      return rule.extract(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataFileError('bad_value', table.file, `row ${rowIndex + 1}, column "${column}": ${reason}`);
    }
  };
}

export function decodeCatalog(table: CsvTable, category: PuzzleCategory, ledger: CompletionLedger): PuzzleRecord[] {
  const readName = bindField(table, CATALOG_FIELDS.name);
  const readXp = bindField(table, CATALOG_FIELDS.xp);
  const readSize = bindField(table, CATALOG_FIELDS.size);
  const readDifficulty = bindField(table, CATALOG_FIELDS.difficulty);

  return table.rows.map((row, rowIndex) => {
    const name = readName(row, rowIndex);
    const { width, height } = readSize(row, rowIndex);
    return {
      name,
      xp: readXp(row, rowIndex),
      width,
      height,
      difficulty: readDifficulty(row, rowIndex),
      category,
      lastDone: lookupLastDone(ledger, name, NEVER_DONE)
    };
  });
}

export function loadCatalog(file: string, category: PuzzleCategory, ledger: CompletionLedger): PuzzleRecord[] {
  console.log(`Reading csv file : ${file}`);
  return decodeCatalog(readCsvTable(file), category, ledger);
}

export const loadCatalogs = (paths: DataPaths, ledger: CompletionLedger): PuzzleCatalogs => ({
  color: loadCatalog(paths.color, 'color', ledger),
  bw: loadCatalog(paths.bw, 'bw', ledger)
});
